export * from './args.js';
export * from './exit-codes.js';
export * from './format.js';
export { runCli, shutdownSignal } from './main.js';
