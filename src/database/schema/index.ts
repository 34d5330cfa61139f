export * from './enums.js';
export * from './accounts.js';
export * from './employees.js';
export * from './services.js';
export * from './working-days.js';
export * from './reservations.js';
