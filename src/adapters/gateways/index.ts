export * from './mercadopago';
export * from './flow';
export * from './mock';
export { defaultHttpClient } from './gateway-http';
