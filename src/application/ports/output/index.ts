export * from './message-queue.port';
export * from './fault-sink.port';
