import { registerHandler } from '../common/handler';
import {
  ADD_FILE,
  BROADCAST,
  PARALLELIZE,
  PIPELINE,
  READ_FILE,
  RELEASE_BROADCAST,
  RUN_JOB,
  TEXT_FILE,
  WHOLE_TEXT_FILES,
} from '../common/protocol';

registerHandler(READ_FILE, ({ path, numPartitions, serializer }, context) =>
  context.readFile(path, numPartitions, serializer),
);

registerHandler(PARALLELIZE, ({ batches, numPartitions, serializer }, context) =>
  context.ingest(Buffer.concat(batches), numPartitions, serializer),
);

registerHandler(TEXT_FILE, ({ path, numPartitions, serializer }, context) =>
  context.textFile(path, numPartitions, serializer),
);

registerHandler(
  WHOLE_TEXT_FILES,
  ({ path, numPartitions, serializer }, context) =>
    context.wholeTextFiles(path, numPartitions, serializer),
);

registerHandler(PIPELINE, ({ parent, command }, context) =>
  context.pipeline(parent, command),
);

registerHandler(RUN_JOB, (payload, context) => context.runJob(payload));

registerHandler(BROADCAST, ({ id, data }, context) =>
  context.addBroadcast(id, data),
);

registerHandler(RELEASE_BROADCAST, (id, context) =>
  context.releaseBroadcast(id),
);

registerHandler(ADD_FILE, (file, context) => context.addFile(file));
