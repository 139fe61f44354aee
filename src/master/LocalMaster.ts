import * as os from 'os';
import * as path from 'path';
import * as fs from 'fs-extra';
import type { LocalClient } from '../client/LocalClient';
import { Response } from '../client/Client';
import debug from '../common/debug';
import { LocalWorker } from '../worker/LocalWorker';
import { MasterServer } from './MasterServer';
import * as fileLoader from './loaders/fileLoader';

export interface MasterOpts {
  workerCount: number;
  showProgress: boolean;
  // Scratch directory to use instead of a fresh one under the OS temp dir.
  localDir?: string;
}

export class LocalMaster extends MasterServer {
  client: LocalClient;
  opts: MasterOpts;
  scratchDir: string | null = null;
  ownsScratchDir = false;

  constructor(client: LocalClient, opts: MasterOpts) {
    super();
    this.client = client;
    this.opts = opts;
    this.workers = new Array(this.opts.workerCount)
      .fill(0)
      .map((v, i) => new LocalWorker(this, `${i}`));
    this.registerFileLoader(fileLoader);
  }

  send(m: Response) {
    this.client.processMessage(m);
  }

  localDir(): string {
    if (this.scratchDir == null) {
      throw new Error('Master not inited.');
    }
    return this.scratchDir;
  }

  async init(): Promise<void> {
    await super.init();
    debug('Launching %d workers.', this.workers.length);
    if (this.opts.localDir) {
      this.scratchDir = path.resolve(this.opts.localDir);
      await fs.mkdirs(this.scratchDir);
    } else {
      this.scratchDir = await fs.mkdtemp(path.join(os.tmpdir(), 'pbridge-engine-'));
      this.ownsScratchDir = true;
    }
    debug('Master ready, scratch dir %s.', this.scratchDir);
  }

  async dispose(): Promise<void> {
    await super.dispose();
    if (this.scratchDir != null) {
      await fs.remove(
        this.ownsScratchDir ? this.scratchDir : path.join(this.scratchDir, 'files'),
      );
      this.scratchDir = null;
    }
    debug('Bye.');
  }
}
