export * from './issuance-client.interface';
