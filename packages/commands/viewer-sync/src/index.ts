export { ViewerSyncCommand, type ViewerSyncCommandOptions } from './command.js';
export { parseCLIArgs } from './util/index.js';
