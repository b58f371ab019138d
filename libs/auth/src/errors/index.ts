export * from './auth.errors';
