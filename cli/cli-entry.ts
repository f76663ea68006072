/**
 * Main entry point for the stache CLI application.
 */
import { main } from './index';

process.exitCode = main(process.argv.slice(2));
