import * as path from 'path';
import * as fs from 'fs-extra';
import { DatasetRef, PARALLELIZE, READ_FILE } from '../common/protocol';
import { Serializer } from '../serializer/Serializer';
import { Client } from './Client';
import { DebugFunc } from '../common/debug';

async function writeFully(fd: number, buf: Buffer): Promise<void> {
  for (let offset = 0; offset < buf.length; ) {
    const { bytesWritten } = await fs.write(fd, buf, offset);
    offset += bytesWritten;
  }
}

export type StagingType = 'file' | 'direct';

export interface StagingStrategy {
  readonly type: StagingType;
  stage(
    data: unknown[],
    numPartitions: number,
    serializer: Serializer,
  ): Promise<DatasetRef>;
}

/**
 * Write the encoded collection to a file in the context temp dir and let
 * the engine read and partition it. The file belongs to the engine between
 * hand-off and acknowledgement, and is removed on every exit path.
 */
export class FileStager implements StagingStrategy {
  readonly type = 'file';
  client: Client;
  tempDir: string;
  debug: DebugFunc;
  fileCounter = 0;

  constructor(client: Client, tempDir: string, debug: DebugFunc) {
    this.client = client;
    this.tempDir = tempDir;
    this.debug = debug;
  }

  nextFile(): string {
    return path.join(this.tempDir, `to_parallelize-${++this.fileCounter}`);
  }

  async stage(
    data: unknown[],
    numPartitions: number,
    serializer: Serializer,
  ): Promise<DatasetRef> {
    const file = this.nextFile();
    try {
      const fd = await fs.open(file, 'wx');
      let frames = 0;
      try {
        for (const batch of serializer.batches(data)) {
          await writeFully(fd, batch);
          frames++;
        }
      } finally {
        await fs.close(fd);
      }
      this.debug('Staged %d frames into %s', frames, file);

      return await this.client.request({
        type: READ_FILE,
        payload: {
          path: file,
          numPartitions,
          serializer: serializer.descriptor(),
        },
      });
    } finally {
      await fs.remove(file);
    }
  }
}

// Ship the encoded batches inside the request itself.
export class DirectStager implements StagingStrategy {
  readonly type = 'direct';
  client: Client;

  constructor(client: Client) {
    this.client = client;
  }

  stage(
    data: unknown[],
    numPartitions: number,
    serializer: Serializer,
  ): Promise<DatasetRef> {
    return this.client.request({
      type: PARALLELIZE,
      payload: {
        batches: [...serializer.batches(data)],
        numPartitions,
        serializer: serializer.descriptor(),
      },
    });
  }
}
