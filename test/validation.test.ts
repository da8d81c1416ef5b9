import chai from 'chai';
import { ORDERSIDES, ORDERTYPES, TIMEINFORCE } from '../src/core/constants';
import { ValidationError } from '../src/errors';
import type { OrderRequestRaw } from '../src/interfaces';
import { validateOrder } from '../src/validation';

const assert: Chai.AssertStatic = chai.assert;

const base: OrderRequestRaw = { symbol: 'BTCUSDT', side: 'BUY', type: 'MARKET', quantity: '0.01' };

const issuesOf = (raw: OrderRequestRaw): string[] => {
  try {
    validateOrder(raw);
  } catch (error) {
    if (error instanceof ValidationError) {
      return error.issues;
    }
    throw error;
  }
  return [];
};

describe('validateOrder', () => {
  it('should accept a market order without a time in force', () => {
    const order = validateOrder(base);
    assert.equal(order.symbol, 'BTCUSDT');
    assert.equal(order.side, ORDERSIDES.BUY);
    assert.equal(order.type, ORDERTYPES.MARKET);
    assert.equal(order.quantity, '0.01');
    assert.isUndefined(order.timeInForce);
    assert.isFalse(order.reduceOnly);
    assert.isUndefined(order.price);
    assert.isUndefined(order.stopPrice);
  });

  it('should keep decimal strings exactly as given', () => {
    const order = validateOrder({ ...base, type: 'STOP_LIMIT', price: '90.50', stop_price: '89' });
    assert.equal(order.price, '90.50');
    assert.equal(order.stopPrice, '89');
  });

  for (const type of ['LIMIT', 'STOP_LIMIT']) {
    it(`should reject a ${type} order without a price`, () => {
      assert.throws(() => validateOrder({ ...base, type, stop_price: '89' }), ValidationError, `${type} orders require --price`);
    });
  }

  it('should reject a STOP order without a stop price', () => {
    assert.deepEqual(issuesOf({ ...base, type: 'STOP' }), ['STOP orders require --stop_price']);
  });

  it('should report every missing field of a STOP_LIMIT order', () => {
    assert.deepEqual(issuesOf({ ...base, type: 'STOP_LIMIT' }), [
      'STOP_LIMIT orders require --price',
      'STOP_LIMIT orders require --stop_price',
    ]);
  });

  it('should reject a TRAILING_STOP order without a callback rate', () => {
    assert.deepEqual(issuesOf({ ...base, type: 'TRAILING_STOP' }), ['TRAILING_STOP orders require --callback_rate']);
  });

  it('should reject a callback rate outside 0.1 to 10', () => {
    assert.deepEqual(issuesOf({ ...base, type: 'TRAILING_STOP', callback_rate: '12' }), [
      'Callback rate must be between 0.1 and 10',
    ]);
    assert.deepEqual(issuesOf({ ...base, type: 'TRAILING_STOP', callback_rate: '0.05' }), [
      'Callback rate must be between 0.1 and 10',
    ]);
  });

  it('should accept a trailing stop with activation price', () => {
    const order = validateOrder({ ...base, type: 'TRAILING_STOP', callback_rate: '1.5', activation_price: '30000' });
    assert.equal(order.callbackRate, '1.5');
    assert.equal(order.activationPrice, '30000');
  });

  it('should keep an explicit time in force', () => {
    const order = validateOrder({ ...base, type: 'LIMIT', price: '90', time_in_force: 'IOC' });
    assert.equal(order.timeInForce, TIMEINFORCE.IMMEDIATE_OR_CANCEL);
  });

  it('should reject a lowercase symbol', () => {
    assert.deepEqual(issuesOf({ ...base, symbol: 'btcusdt' }), ['Symbol must be uppercase (e.g., BTCUSDT)']);
  });

  it('should reject a non numeric or non positive quantity', () => {
    assert.deepEqual(issuesOf({ ...base, quantity: 'abc' }), ['Quantity must be a number']);
    assert.deepEqual(issuesOf({ ...base, quantity: '0' }), ['Quantity must be positive']);
    assert.deepEqual(issuesOf({ ...base, quantity: '-1' }), ['Quantity must be a number']);
  });

  it('should reject a non numeric price', () => {
    assert.deepEqual(issuesOf({ ...base, type: 'LIMIT', price: '1e3' }), ['Price must be a number']);
  });

  it('should reject an unknown side, type or time in force', () => {
    assert.deepEqual(issuesOf({ ...base, side: 'HOLD' }), ['Side must be one of BUY, SELL']);
    assert.deepEqual(issuesOf({ ...base, type: 'OCO' }), [
      'Type must be one of MARKET, LIMIT, STOP, STOP_LIMIT, TRAILING_STOP',
    ]);
    assert.deepEqual(issuesOf({ ...base, time_in_force: 'DAY' }), ['Time in force must be one of GTC, IOC, FOK, GTX']);
  });

  it('should require a quantity', () => {
    assert.deepEqual(issuesOf({ symbol: 'BTCUSDT', side: 'SELL', type: 'MARKET' }), ['Quantity is required']);
  });
});
