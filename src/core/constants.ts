export enum ORDERSIDES {
  BUY = 'BUY',
  SELL = 'SELL',
}

export enum ORDERTYPES {
  MARKET = 'MARKET',
  LIMIT = 'LIMIT',
  STOP = 'STOP',
  STOP_LIMIT = 'STOP_LIMIT',
  TRAILING_STOP = 'TRAILING_STOP',
}

// order type names as the futures API expects them
export enum EXCHANGEORDERTYPES {
  MARKET = 'MARKET',
  LIMIT = 'LIMIT',
  STOP = 'STOP',
  STOP_MARKET = 'STOP_MARKET',
  TRAILING_STOP_MARKET = 'TRAILING_STOP_MARKET',
}

export enum TIMEINFORCE {
  GOOD_TILL_CANCEL = 'GTC',
  IMMEDIATE_OR_CANCEL = 'IOC',
  FILL_OR_KILL = 'FOK',
  POST_ONLY = 'GTX',
}

export enum WORKINGTYPES {
  MARK_PRICE = 'MARK_PRICE',
  CONTRACT_PRICE = 'CONTRACT_PRICE',
}

export const ORDERTYPE_MAP: Record<ORDERTYPES, EXCHANGEORDERTYPES> = {
  [ORDERTYPES.MARKET]: EXCHANGEORDERTYPES.MARKET,
  [ORDERTYPES.LIMIT]: EXCHANGEORDERTYPES.LIMIT,
  [ORDERTYPES.STOP]: EXCHANGEORDERTYPES.STOP_MARKET,
  [ORDERTYPES.STOP_LIMIT]: EXCHANGEORDERTYPES.STOP,
  [ORDERTYPES.TRAILING_STOP]: EXCHANGEORDERTYPES.TRAILING_STOP_MARKET,
};

// types that fill at market once triggered, these use the MARKET_LOT_SIZE filter
export const MARKET_EXECUTED_TYPES: readonly ORDERTYPES[] = [
  ORDERTYPES.MARKET,
  ORDERTYPES.STOP,
  ORDERTYPES.TRAILING_STOP,
];

export const CALLBACK_RATE_MIN = 0.1;
export const CALLBACK_RATE_MAX = 10;

export enum EXITCODES {
  SUCCESS = 0,
  EXCHANGE_ERROR = 1,
  VALIDATION_ERROR = 2,
}
