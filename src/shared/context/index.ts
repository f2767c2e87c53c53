export * from './request-context';
export * from './clock';
