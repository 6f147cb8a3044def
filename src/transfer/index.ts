export { TransferEngine, classifyFault, defaultTransferEngine, ensureSynchronousWriter } from './TransferEngine.js';
export type { TransferSource } from './TransferEngine.js';
