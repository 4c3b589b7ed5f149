export * from './dependency-resolver';
export * from './exporter';
