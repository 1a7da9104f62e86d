export * from './mercadopago-gateway.adapter';
