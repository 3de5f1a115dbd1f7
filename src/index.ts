export * from './protocol/messages.js';
export * from './protocol/codec.js';
export * from './registry/peer.js';
export * from './registry/peer-file.js';
export * from './registry/peer-directory.js';
export * from './registry/presence.js';
export * from './transport/udp.js';
export * from './peer/types.js';
export * from './peer/broadcaster.js';
export * from './peer/dispatcher.js';
export * from './peer/receiver.js';
export * from './peer/keepalive.js';
export * from './peer/probe.js';
export * from './peer/commands.js';
export * from './history.js';
export * from './config.js';
export * from './node.js';
export {
  createStatusRouter,
  createStatusApp,
  startStatusServer,
  type StatusSource,
} from './status/status-api.js';
export * from './utils.js';
