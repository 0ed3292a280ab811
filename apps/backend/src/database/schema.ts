export * from './schemas/accounts';
export * from './schemas/authorities';
export * from './schemas/records';
export * from './schemas/registry-admins';
export * from './schemas/registry-counters';
export * from './schemas/audit-logs';
