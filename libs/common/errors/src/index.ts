export * from './error-codes';
export * from './service-error';
export * from './errors-factory';
export * from './service-error.filter';
