export * from './certificate-record.interface';
