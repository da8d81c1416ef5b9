// Maps an order request onto the futures API and places it
import { BigNumber } from 'bignumber.js';
import {
  MARKET_EXECUTED_TYPES,
  ORDERTYPE_MAP,
  ORDERTYPES,
  TIMEINFORCE,
  WORKINGTYPES,
} from './core/constants';
import { ExchangeError, ValidationError } from './errors';
import type { ExchangeClient, ExchangeInfo, FuturesOrder, FuturesOrderParams, OrderRequest, SymbolFilter } from './interfaces';
import { describeParams, getLogger } from './utils';

const logger = getLogger();

const PRICED_TYPES = [ORDERTYPES.LIMIT, ORDERTYPES.STOP_LIMIT];
const STOP_TYPES = [ORDERTYPES.STOP, ORDERTYPES.STOP_LIMIT];

/**
 * Build the exchange parameters for an order. Only the fields that belong to
 * the order type are sent; anything else supplied is dropped with a warning
 */
export const buildOrderParams = (order: OrderRequest): FuturesOrderParams => {
  const params: FuturesOrderParams = {
    symbol: order.symbol,
    side: order.side,
    type: ORDERTYPE_MAP[order.type],
    quantity: order.quantity,
  };
  const ignored: string[] = [];

  if (PRICED_TYPES.includes(order.type)) {
    params.price = order.price;
    params.timeInForce = order.timeInForce ?? TIMEINFORCE.GOOD_TILL_CANCEL;
  } else {
    if (order.price !== undefined) ignored.push('price');
    if (order.timeInForce !== undefined) ignored.push('time_in_force');
  }

  if (STOP_TYPES.includes(order.type)) {
    params.stopPrice = order.stopPrice;
  } else if (order.stopPrice !== undefined) {
    ignored.push('stop_price');
  }

  if (order.type === ORDERTYPES.TRAILING_STOP) {
    params.callbackRate = order.callbackRate;
    if (order.activationPrice !== undefined) {
      params.activationPrice = order.activationPrice;
    }
  } else {
    if (order.callbackRate !== undefined) ignored.push('callback_rate');
    if (order.activationPrice !== undefined) ignored.push('activation_price');
  }

  // trailing stops follow the mark price unless told otherwise
  if (order.type === ORDERTYPES.TRAILING_STOP) {
    params.workingType = order.workingType ?? WORKINGTYPES.MARK_PRICE;
  } else if (STOP_TYPES.includes(order.type)) {
    if (order.workingType !== undefined) {
      params.workingType = order.workingType;
    }
  } else if (order.workingType !== undefined) {
    ignored.push('working_type');
  }

  if (order.reduceOnly) {
    params.reduceOnly = 'true';
  }

  if (ignored.length) {
    logger.warn(`Ignoring ${ignored.join(', ')} for ${order.type} order`);
  }
  return params;
};

/**
 * Place one order. Exchange failures are logged and rethrown as they are
 */
export const placeOrder = async (client: ExchangeClient, order: OrderRequest): Promise<FuturesOrder> => {
  const params = buildOrderParams(order);
  logger.info(`Placing order with params: ${describeParams(params)}`);
  try {
    const response = await client.createOrder(params);
    logger.info(`Order placed successfully: ${describeParams(response)}`);
    return response;
  } catch (error) {
    if (error instanceof ExchangeError) {
      logger.error(error.describe());
    } else {
      logger.error(`Unexpected error: ${(error as Error).message}`);
    }
    throw error;
  }
};

/**
 * Available futures balance for an asset, zero when the account holds none
 */
export const getBalance = async (client: ExchangeClient, asset = 'USDT'): Promise<BigNumber> => {
  try {
    const balances = await client.getBalances();
    const balance = balances.find((item) => item.asset === asset);
    return new BigNumber(balance ? balance.availableBalance : 0);
  } catch (error) {
    logger.error(`Failed to get balance: ${(error as Error).message}`);
    throw error;
  }
};

const findLotSize = (filters: SymbolFilter[], type: ORDERTYPES): SymbolFilter | undefined => {
  const lotSize = filters.find((filter) => filter.filterType === 'LOT_SIZE');
  if (MARKET_EXECUTED_TYPES.includes(type)) {
    return filters.find((filter) => filter.filterType === 'MARKET_LOT_SIZE') ?? lotSize;
  }
  return lotSize;
};

/**
 * Check the quantity against the symbol's lot size rules and round it down
 * to the step size. Prices are left untouched
 */
export const normalizeQuantity = async (client: ExchangeClient, order: OrderRequest): Promise<OrderRequest> => {
  let info: ExchangeInfo;
  try {
    info = await client.getExchangeInfo();
  } catch (error) {
    logger.error(`Failed to load exchange info: ${(error as Error).message}`);
    throw error;
  }
  const symbolInfo = info.symbols.find((item) => item.symbol === order.symbol);
  if (!symbolInfo) {
    throw new ValidationError(`No market found by symbol ${order.symbol}`);
  }
  const lotSize = findLotSize(symbolInfo.filters, order.type);
  if (!lotSize) {
    return order;
  }

  const quantity = new BigNumber(order.quantity);
  const minQty = new BigNumber(lotSize.minQty ?? 0);
  const maxQty = new BigNumber(lotSize.maxQty ?? Infinity);
  if (quantity.lt(minQty) || quantity.gt(maxQty)) {
    throw new ValidationError(`Quantity must be between ${minQty.toFixed()} and ${maxQty.toFixed()}`);
  }

  const stepSize = new BigNumber(lotSize.stepSize ?? 0);
  if (stepSize.lte(0)) {
    return order;
  }
  const rounded = quantity.dividedToIntegerBy(stepSize).times(stepSize);
  if (rounded.lte(0)) {
    throw new ValidationError(`Quantity ${order.quantity} is below the step size ${stepSize.toFixed()}`);
  }
  const normalized = rounded.toFixed(stepSize.decimalPlaces() ?? 0);
  if (!rounded.eq(quantity)) {
    logger.warn(`Quantity ${order.quantity} rounded down to ${normalized} (step ${stepSize.toFixed()})`);
  }
  return { ...order, quantity: normalized };
};
