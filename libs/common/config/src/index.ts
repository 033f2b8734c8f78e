export { default } from './configuration';
export * from './configuration';
export * from './config.module';
