export const STATE_STORE = Symbol('STATE_STORE');
