export const TARGET_SERVER_ADMIN = Symbol('TARGET_SERVER_ADMIN');
