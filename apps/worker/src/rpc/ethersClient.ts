// RpcClient over an ethers v6 JsonRpcProvider
import { ethers } from 'ethers';
import type { LogFilter, RawLog, RpcClient, TxReceipt } from '../ports/index.js';

export const POLYGON_CHAIN_ID = 137;

export class EthersRpcClient implements RpcClient {
    private readonly provider: ethers.JsonRpcProvider;

    constructor(readonly url: string, chainId: number = POLYGON_CHAIN_ID) {
        // Static network: skip the eth_chainId request ethers would otherwise make before every call
        // One request per call so a failure maps to exactly one pool call
        this.provider = new ethers.JsonRpcProvider(url, chainId, {
            staticNetwork: true,
            batchMaxCount: 1,
        });
    }

    async getLogs(filter: LogFilter): Promise<RawLog[]> {
        const logs = await this.provider.getLogs({
            address: filter.address,
            topics: filter.topics,
            fromBlock: filter.fromBlock,
            toBlock: filter.toBlock,
        });

        return logs.map(log => ({
            address: log.address,
            topics: [...log.topics],
            data: log.data,
            blockNumber: log.blockNumber,
            transactionHash: log.transactionHash,
            logIndex: log.index,
        }));
    }

    getBlockNumber(): Promise<number> {
        return this.provider.getBlockNumber();
    }

    async getBlockTimestamp(blockNumber: number): Promise<number> {
        const block = await this.provider.getBlock(blockNumber);
        if (!block) {
            throw new Error(`Block ${blockNumber} not found`);
        }
        return block.timestamp;
    }

    async getReceipt(txHash: string): Promise<TxReceipt | null> {
        const receipt = await this.provider.getTransactionReceipt(txHash);
        if (!receipt) return null;
        return {
            transactionHash: receipt.hash,
            gasUsed: receipt.gasUsed,
            gasPrice: receipt.gasPrice,
            status: receipt.status,
        };
    }

    destroy(): void {
        this.provider.destroy();
    }
}
