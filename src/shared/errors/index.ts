export * from './stream.errors';
