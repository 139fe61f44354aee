import { Response } from '../client/Client';

export default class WorkerContext {
  send: (msg: Response) => void;

  constructor(send: (msg: Response) => void) {
    this.send = send;
  }

  tick(job: number, tick = 1) {
    this.send({
      type: 'progress',
      job,
      tick,
    });
  }
}
