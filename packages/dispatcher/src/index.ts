export const PACKAGE_NAME = '@switchyard/dispatcher';

export { Dispatcher, ACTIVITY, TIMED_OUT_MESSAGE, CANCELLED_MESSAGE, notFoundMessage } from './dispatcher.js';
export type { DispatcherOptions } from './dispatcher.js';
export { parseCommand, formatCommand } from './command-parser.js';
export type { ParseResult } from './command-parser.js';
export { CommandParseError } from './errors.js';
