export * from './consumer.port';
