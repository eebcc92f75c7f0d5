export * from './src/types.js';
export * from './src/errors.js';
export * from './src/config.js';
export * from './src/protocol/codec.js';
export * from './src/protocol/requests.js';
export * from './src/protocol/responses.js';
export * from './src/service/diagnostics.js';
export * from './src/service/language-map.js';
export * from './src/service/lsp-client.js';
export * from './src/service/managed-server.js';
export * from './src/service/message-router.js';
export * from './src/service/server-manager.js';
export * from './src/service/server-process.js';
export * from './src/service/server-registry.js';
export * from './src/utils/uri.js';
