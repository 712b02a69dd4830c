/**
 * RpcClient interface - the JSON-RPC calls the endpoint pool makes against one endpoint
 *
 * Implementations:
 * - EthersRpcClient (ethers JsonRpcProvider)
 * - in-process fakes in tests
 */

export interface LogFilter {
    address: string;
    topics: Array<string | null>;
    fromBlock: number;
    toBlock: number;
}

/**
 * A matched log as the node returns it
 */
export interface RawLog {
    address: string;
    topics: string[];
    data: string;
    blockNumber: number;
    transactionHash: string;
    logIndex: number;
}

export interface TxReceipt {
    transactionHash: string;
    gasUsed: bigint;
    /** Effective gas price paid, when the node reports it */
    gasPrice: bigint | null;
    /** 1 = success, 0 = reverted, null = pre-Byzantium */
    status: number | null;
}

export interface RpcClient {
    readonly url: string;

    getLogs(filter: LogFilter): Promise<RawLog[]>;

    getBlockNumber(): Promise<number>;

    /**
     * Unix seconds
     */
    getBlockTimestamp(blockNumber: number): Promise<number>;

    getReceipt(txHash: string): Promise<TxReceipt | null>;

    /**
     * Release sockets/timers held by the client
     */
    destroy(): void;
}
