import type { FuturesOrder, FuturesOrderParams } from './order.interface';

export interface FuturesBalance {
    accountAlias?: string;
    asset: string;
    balance: string;
    availableBalance: string;
    crossWalletBalance?: string;
    crossUnPnl?: string;
    maxWithdrawAmount?: string;
    updateTime?: number;
}

export interface FuturesAccount {
    canTrade: boolean;
    totalWalletBalance: string;
    availableBalance: string;
    assets: FuturesBalance[];
}

export interface SymbolFilter {
    filterType: string;
    minQty?: string;
    maxQty?: string;
    stepSize?: string;
    minPrice?: string;
    maxPrice?: string;
    tickSize?: string;
}

export interface SymbolInfo {
    symbol: string;
    status: string;
    baseAsset: string;
    quoteAsset: string;
    filters: SymbolFilter[];
}

export interface ExchangeInfo {
    serverTime: number;
    symbols: SymbolInfo[];
}

/**
 * The calls the dispatcher needs from an authenticated futures client
 */
export interface ExchangeClient {
    getAccount(): Promise<FuturesAccount>;
    getBalances(): Promise<FuturesBalance[]>;
    getExchangeInfo(): Promise<ExchangeInfo>;
    createOrder(params: FuturesOrderParams): Promise<FuturesOrder>;
}
