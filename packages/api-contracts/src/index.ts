export * from './common/enums.js';
export * from './common/responses.js';

export * from './endpoints/system/ping.js';
export * from './endpoints/system/status.js';
export * from './endpoints/uploads/create.js';
