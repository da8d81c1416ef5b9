export interface ExchangeConfig {
    testnet: boolean;
    liveApiRoot: string;
    testnetApiRoot: string;
    apiKey: string;
    apiSecret: string;
    recvWindow: number;
    timeoutMS: number;
}

export interface LogConfig {
    level: string;
    file: string;
    silent: boolean;
}

export interface BotConfig {
    exchange: ExchangeConfig;
    balanceAsset: string;
    log: LogConfig;
}
