export { createProgram } from './program.js';
export { createCliContext, type CliContext, type CliContextOptions } from './context.js';
export { connectDapProxy, type DapProxyConnection, type DapProxyStreams } from './dap/connect-dap-proxy.js';
export { createToolRequestInterceptor } from './dap/tool-requests.js';
export {
  getUserDir,
  getUserBasePath,
  getDefaultProjectConfigPath,
  resolveMergedSyncConfig,
} from './config-loader.js';
