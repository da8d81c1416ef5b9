import { BigNumber } from 'bignumber.js';
import { z } from 'zod';
import {
  CALLBACK_RATE_MAX,
  CALLBACK_RATE_MIN,
  ORDERSIDES,
  ORDERTYPES,
  TIMEINFORCE,
  WORKINGTYPES,
} from './core/constants';
import { ValidationError } from './errors';
import type { OrderRequest, OrderRequestRaw } from './interfaces';

const DECIMAL = /^\d+(\.\d+)?$/;

const positiveDecimal = (label: string) =>
  z
    .string({ required_error: `${label} is required`, invalid_type_error: `${label} must be a number` })
    .regex(DECIMAL, `${label} must be a number`)
    .refine((value) => !DECIMAL.test(value) || new BigNumber(value).gt(0), `${label} must be positive`);

const orderSchema = z
  .object({
    symbol: z
      .string({ required_error: 'Symbol is required' })
      .regex(/^[A-Z0-9]+$/, 'Symbol must be uppercase (e.g., BTCUSDT)'),
    side: z.nativeEnum(ORDERSIDES, {
      errorMap: () => ({ message: 'Side must be one of BUY, SELL' }),
    }),
    type: z.nativeEnum(ORDERTYPES, {
      errorMap: () => ({ message: `Type must be one of ${Object.values(ORDERTYPES).join(', ')}` }),
    }),
    quantity: positiveDecimal('Quantity'),
    price: positiveDecimal('Price').optional(),
    stop_price: positiveDecimal('Stop price').optional(),
    callback_rate: positiveDecimal('Callback rate')
      .refine(
        (value) => {
          const rate = new BigNumber(value);
          return !rate.gt(0) || (rate.gte(CALLBACK_RATE_MIN) && rate.lte(CALLBACK_RATE_MAX));
        },
        `Callback rate must be between ${CALLBACK_RATE_MIN} and ${CALLBACK_RATE_MAX}`,
      )
      .optional(),
    activation_price: positiveDecimal('Activation price').optional(),
    time_in_force: z
      .nativeEnum(TIMEINFORCE, {
        errorMap: () => ({ message: `Time in force must be one of ${Object.values(TIMEINFORCE).join(', ')}` }),
      })
      .optional(),
    working_type: z
      .nativeEnum(WORKINGTYPES, {
        errorMap: () => ({ message: `Working type must be one of ${Object.values(WORKINGTYPES).join(', ')}` }),
      })
      .optional(),
    reduce_only: z.boolean().default(false),
  })
  .superRefine((order, ctx) => {
    const requireFlag = (present: boolean, flag: string) => {
      if (!present) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${order.type} orders require --${flag}` });
      }
    };
    if (order.type === ORDERTYPES.LIMIT || order.type === ORDERTYPES.STOP_LIMIT) {
      requireFlag(order.price !== undefined, 'price');
    }
    if (order.type === ORDERTYPES.STOP || order.type === ORDERTYPES.STOP_LIMIT) {
      requireFlag(order.stop_price !== undefined, 'stop_price');
    }
    if (order.type === ORDERTYPES.TRAILING_STOP) {
      requireFlag(order.callback_rate !== undefined, 'callback_rate');
    }
  });

/**
 * Check raw command line values and turn them into an order request.
 * Throws ValidationError listing every problem found
 */
export const validateOrder = (raw: OrderRequestRaw): OrderRequest => {
  const result = orderSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(result.error.issues.map((issue) => issue.message));
  }
  const order = result.data;
  return {
    symbol: order.symbol,
    side: order.side,
    type: order.type,
    quantity: order.quantity,
    price: order.price,
    stopPrice: order.stop_price,
    callbackRate: order.callback_rate,
    activationPrice: order.activation_price,
    timeInForce: order.time_in_force,
    workingType: order.working_type,
    reduceOnly: order.reduce_only,
  };
};
