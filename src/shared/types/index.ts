export * from './command.types';
export * from './event.types';
export * from './aggregate.types';
