/**
 * Jest setup, run before every test file.
 *
 * Decorated classes need reflect-metadata loaded first. Jest's console also
 * prints a stack trace under every log line, so it is swapped for Node's.
 */
import 'reflect-metadata';
import { Console } from 'console';

global.console = new Console({ stdout: process.stdout, stderr: process.stderr });
