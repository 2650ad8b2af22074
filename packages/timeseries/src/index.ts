export * from './errors';
export * from './key';
export * from './schema';
export * from './row';
export * from './table';
export * from './tableFile';
export * from './atomicWriter';
export * from './reconcile';
export * from './validate';
export * from './report';
