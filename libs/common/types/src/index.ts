export * from './file-size';
