import { BigNumber } from 'bignumber.js';
import { Command, CommanderError, Option } from 'commander';
import { EXITCODES } from './core/constants';
import { getBalance, normalizeQuantity, placeOrder } from './dispatcher';
import { ExchangeError, ValidationError } from './errors';
import { type FuturesClientOptions, FuturesRestClient } from './futuresapi';
import type { ExchangeClient, FuturesOrder } from './interfaces';
import { getApiRoot, getConfig, getLogger } from './utils';
import { validateOrder } from './validation';

const logger = getLogger();
const config = getConfig();

type CliOptions = {
  symbol: string;
  side: string;
  type: string;
  quantity: string;
  price?: string;
  stop_price?: string;
  callback_rate?: string;
  trailing_delta?: string;
  activation_price?: string;
  time_in_force?: string;
  working_type?: string;
  reduce_only?: boolean;
  api_key?: string;
  api_secret?: string;
  testnet?: boolean;
  live?: boolean;
  asset?: string;
};

export interface CliDependencies {
  createClient: (options: FuturesClientOptions) => ExchangeClient;
  print: (line: string) => void;
}

const defaultDependencies: CliDependencies = {
  createClient: (options) => new FuturesRestClient(options),
  print: (line) => console.log(line),
};

const buildProgram = (print: (line: string) => void) =>
  new Command()
    .name('futures-order-bot')
    .description('Place an order on the futures exchange (testnet by default)')
    .requiredOption('--symbol <symbol>', 'Trading pair (e.g., BTCUSDT)')
    .requiredOption('--side <side>', 'Order side: BUY or SELL')
    .requiredOption('--type <type>', 'Order type: MARKET, LIMIT, STOP, STOP_LIMIT or TRAILING_STOP')
    .requiredOption('--quantity <quantity>', 'Order quantity')
    .option('--price <price>', 'Limit price for LIMIT and STOP_LIMIT orders')
    .option('--stop_price <price>', 'Trigger price for STOP and STOP_LIMIT orders')
    .option('--callback_rate <rate>', 'Callback rate in percent (0.1-10) for TRAILING_STOP orders')
    .addOption(new Option('--trailing_delta <rate>', 'Same as --callback_rate').hideHelp())
    .option('--activation_price <price>', 'Activation price for TRAILING_STOP orders')
    .option('--time_in_force <tif>', 'GTC (default), IOC, FOK or GTX for LIMIT and STOP_LIMIT orders')
    .option('--working_type <type>', 'Trigger price source: MARK_PRICE or CONTRACT_PRICE')
    .option('--reduce_only', 'Only reduce an open position')
    .option('--api_key <key>', 'API key (optional if in .env)')
    .option('--api_secret <secret>', 'API secret (optional if in .env)')
    .option('--testnet', 'Use testnet (default)')
    .option('--live', 'Use live exchange')
    .option('--asset <asset>', 'Asset whose balance is shown before trading')
    .exitOverride()
    .configureOutput({
      writeOut: (str) => print(str.trimEnd()),
      writeErr: (str) => print(str.trimEnd()),
    });

const resolveCredentials = (opts: CliOptions) => {
  const apiKey = opts.api_key || config.exchange.apiKey;
  const apiSecret = opts.api_secret || config.exchange.apiSecret;
  if (!apiKey || !apiSecret) {
    throw new ValidationError('API keys must be provided via CLI or .env file');
  }
  return { apiKey, apiSecret };
};

const isSet = (value?: string) => value !== undefined && !new BigNumber(value).isZero();

export const printOrder = (order: FuturesOrder, print: (line: string) => void) => {
  print('Order Result:');
  print(`Order ID: ${order.orderId}`);
  print(`Symbol: ${order.symbol}`);
  print(`Type: ${order.type}`);
  print(`Side: ${order.side}`);
  print(`Quantity: ${order.origQty}`);
  print(`Status: ${order.status}`);
  print(`Executed Quantity: ${order.executedQty}`);
  if (isSet(order.price)) {
    print(`Price: ${order.price}`);
  }
  if (isSet(order.stopPrice)) {
    print(`Stop Price: ${order.stopPrice}`);
  }
};

/**
 * Parse the arguments, place one order and report it. Resolves to the
 * process exit code
 */
export const run = async (argv: string[], dependencies: Partial<CliDependencies> = {}): Promise<EXITCODES> => {
  const { createClient, print } = { ...defaultDependencies, ...dependencies };
  const program = buildProgram(print);

  try {
    program.parse(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXITCODES.SUCCESS : EXITCODES.VALIDATION_ERROR;
    }
    throw error;
  }
  const opts = program.opts<CliOptions>();

  try {
    const order = validateOrder({
      symbol: opts.symbol,
      side: opts.side,
      type: opts.type,
      quantity: opts.quantity,
      price: opts.price,
      stop_price: opts.stop_price,
      callback_rate: opts.callback_rate ?? opts.trailing_delta,
      activation_price: opts.activation_price,
      time_in_force: opts.time_in_force,
      working_type: opts.working_type,
      reduce_only: opts.reduce_only ?? false,
    });
    const credentials = resolveCredentials(opts);
    const testnet = opts.live ? false : opts.testnet ?? config.exchange.testnet;

    const client = createClient({ ...credentials, apiRoot: getApiRoot(testnet) });
    logger.info(`Bot initialized in ${testnet ? 'TESTNET' : 'LIVE'} mode`);
    try {
      await client.getAccount();
    } catch (error) {
      const reason = error instanceof ExchangeError ? error.describe() : (error as Error).message;
      logger.error(`API Connection Failed: ${reason}`);
      throw error;
    }
    logger.info('Successfully connected to the futures API');

    const asset = opts.asset ?? config.balanceAsset;
    const balance = await getBalance(client, asset);
    print(`Available ${asset} balance: ${balance.toFixed(2)}`);

    const normalized = await normalizeQuantity(client, order);
    const response = await placeOrder(client, normalized);
    printOrder(response, print);
    return EXITCODES.SUCCESS;
  } catch (error) {
    print(`Error: ${(error as Error).message}`);
    if (error instanceof ValidationError) {
      logger.error(`Invalid order: ${error.message}`);
      return EXITCODES.VALIDATION_ERROR;
    }
    if (!(error instanceof ExchangeError)) {
      logger.error(`Unexpected error: ${(error as Error).message}`);
    }
    return EXITCODES.EXCHANGE_ERROR;
  }
};
