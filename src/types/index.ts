export * from './calculation';
