export * from './target-server-admin.interface';
export * from './delivery-options.interface';
