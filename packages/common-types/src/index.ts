export * from './core-interfaces';
export * from './auth-status';
export * from './auth-result';
export * from './config-schema';
