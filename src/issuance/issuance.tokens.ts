export const ISSUANCE_CLIENT = Symbol('ISSUANCE_CLIENT');
