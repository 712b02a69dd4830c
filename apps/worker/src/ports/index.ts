/**
 * Ports barrel export - interfaces the worker is wired through
 */

export * from './RpcClient.js';
