export * from './dns-provider.interface';
export * from './credential-scope.interface';
