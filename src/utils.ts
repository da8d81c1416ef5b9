import 'dotenv/config';
import config from "config";
import winston from "winston";
import type { BotConfig } from "./interfaces";

const botConfig = config.get<BotConfig>("bot");
export const getConfig = () => botConfig;

const logger = winston.createLogger({
  level: botConfig.log.level,
  silent: botConfig.log.silent,
  defaultMeta: { service: "FuturesOrderBot" },
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.printf(
      (info) => `${info.timestamp} - ${info.service} - ${info.level.toUpperCase()} - ${info.message}`,
    ),
  ),
  transports: [
    new winston.transports.Console(),
    ...(botConfig.log.file ? [new winston.transports.File({ filename: botConfig.log.file })] : []),
  ],
});

export const getLogger = () => logger;

export const getApiRoot = (testnet: boolean) =>
  testnet ? botConfig.exchange.testnetApiRoot : botConfig.exchange.liveApiRoot;

/**
 * Render params the way they appear in the log, e.g. {symbol=BTCUSDT, side=BUY}
 */
export const describeParams = (params: object) => {
  const pairs = Object.entries(params)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${value}`);
  return `{${pairs.join(", ")}}`;
};
