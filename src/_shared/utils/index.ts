export * from './signature.utils';
