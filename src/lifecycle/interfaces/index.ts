export * from './run-parameters.interface';
export * from './decision.interface';
export * from './run-result.interface';
