/**
 * Swap Jest's console for Node's, so each client log line prints as one line
 * instead of a block with a stack location.
 */
import 'reflect-metadata';
import nodeConsole from 'console';

global.console = nodeConsole;
