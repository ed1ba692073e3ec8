export * from './state-record.interface';
export * from './state-store.interface';
