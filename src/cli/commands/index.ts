/**
 * CLI Commands index
 */

export { configureConvertCommand, runConvert, type ConvertCommandOptions } from './convert.js';
