export * from './task';
export * from './document';
export * from './record';
export * from './events';
