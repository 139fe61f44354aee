import * as os from 'os';
import ProgressBar from 'progress';
import { MasterOpts, LocalMaster } from '../master/LocalMaster';
import { EngineError } from '../common/errors';
import { Request, RequestType, ResultOf } from '../common/protocol';
import { Client, Response } from './Client';

const defaultOpts: MasterOpts = {
  workerCount: os.cpus().length,
  showProgress: false,
};

/**
 * Client for the in-process engine. Every failure the engine raises
 * reaches the caller as an EngineError.
 */
export class LocalClient implements Client {
  master: LocalMaster;
  // One bar per running job, so concurrent jobs keep their own.
  progress = new Map<number, ProgressBar>();
  opts: MasterOpts;

  constructor(opts: Partial<MasterOpts> = {}) {
    this.opts = {
      workerCount: opts.workerCount ?? defaultOpts.workerCount,
      showProgress: opts.showProgress ?? defaultOpts.showProgress,
      localDir: opts.localDir,
    };
    this.master = new LocalMaster(this, this.opts);
  }

  init(): Promise<void> {
    return this.master.init();
  }
  dispose(): Promise<void> {
    return this.master.dispose();
  }
  async request<K extends RequestType>(m: Request<K>): Promise<ResultOf<K>> {
    try {
      return await this.master.processRequest(m);
    } catch (e) {
      throw EngineError.from(e);
    }
  }
  defaultParallelism() {
    return this.master.workers.length;
  }
  localDir() {
    return this.master.localDir();
  }

  processMessage(m: Response) {
    switch (m.type) {
      case 'task': {
        if (this.opts.showProgress) {
          this.progress.set(
            m.job,
            new ProgressBar(
              `Job ${m.job} task ${m.taskIndex}/${m.tasks} :percent [:bar] Partition :current/:total :rate/s :etas`,
              {
                total: m.partitions,
                width: 30,
              },
            ),
          );
        }
        break;
      }
      case 'progress': {
        const bar = this.progress.get(m.job);
        if (bar) {
          bar.tick(m.tick);
        }
        break;
      }
      case 'jobEnd': {
        const bar = this.progress.get(m.job);
        if (bar) {
          // A bar that reached its total has terminated itself.
          if (!bar.complete) {
            bar.terminate();
          }
          this.progress.delete(m.job);
        }
        break;
      }
    }
  }
}
