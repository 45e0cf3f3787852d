/** Client Bounded Context — Barrel Export */
export { RpcClient } from './RpcClient.js';
export type {
    ResponseStream,
    UpdateSink,
    ClientStreamingCall,
    BidiStreamingCall,
} from './RpcClient.js';
