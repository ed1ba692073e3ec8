export type DecisionAction = 'skip' | 'request' | 'renew';

export type DecisionReason =
  | 'hostname-changed'
  | 'environment-changed'
  | 'forced'
  | 'missing'
  | 'expiring'
  | 'valid';

export interface Decision {
  action: DecisionAction;
  reason: DecisionReason;
}
