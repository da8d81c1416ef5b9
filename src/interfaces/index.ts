export * from './config.interface';
export * from './exchange.interface';
export * from './order.interface';
