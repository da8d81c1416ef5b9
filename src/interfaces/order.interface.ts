import type { ORDERSIDES, ORDERTYPES, TIMEINFORCE, WORKINGTYPES, EXCHANGEORDERTYPES } from '../core/constants';

/**
 * One order as parsed from the command line. Decimal values stay strings so
 * they reach the exchange exactly as typed
 */
export interface OrderRequest {
    symbol: string;
    side: ORDERSIDES;
    type: ORDERTYPES;
    quantity: string;
    price?: string;
    stopPrice?: string;
    callbackRate?: string;
    activationPrice?: string;
    timeInForce?: TIMEINFORCE;
    workingType?: WORKINGTYPES;
    reduceOnly: boolean;
}

export interface OrderRequestRaw {
    symbol?: string;
    side?: string;
    type?: string;
    quantity?: string;
    price?: string;
    stop_price?: string;
    callback_rate?: string;
    activation_price?: string;
    time_in_force?: string;
    working_type?: string;
    reduce_only?: boolean;
}

export interface FuturesOrderParams {
    symbol: string;
    side: ORDERSIDES;
    type: EXCHANGEORDERTYPES;
    quantity: string;
    price?: string;
    stopPrice?: string;
    callbackRate?: string;
    activationPrice?: string;
    timeInForce?: TIMEINFORCE;
    workingType?: WORKINGTYPES;
    reduceOnly?: 'true';
}

export interface FuturesOrder {
    orderId: number;
    clientOrderId?: string;
    symbol: string;
    status: string;
    type: string;
    side: string;
    origQty: string;
    executedQty: string;
    price?: string;
    avgPrice?: string;
    stopPrice?: string;
    activatePrice?: string;
    priceRate?: string;
    timeInForce?: string;
    reduceOnly?: boolean;
    workingType?: string;
    updateTime?: number;
}
