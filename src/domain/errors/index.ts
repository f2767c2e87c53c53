export * from './checkout.errors';
