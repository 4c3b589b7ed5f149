export * from './models';
export * from './connection';
export * from './services';
