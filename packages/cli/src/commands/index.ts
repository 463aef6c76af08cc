/**
 * @fileoverview CLI commands export
 */

export { BaseCommand, createContext, addCommonOptions, parseProcessCount } from './base.js';
export { DemoCommand, createDemoCommand } from './demo.js';
export { RunCommand, createRunCommand } from './run.js';
