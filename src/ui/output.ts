import chalk from 'chalk';
import { appendLog } from '../utils/logger.js';

export const ok = (msg: string) => console.log(chalk.green('✓'), msg);
export const info = (msg: string) => console.log(chalk.blue('ℹ'), msg);
export const plain = (msg: string) => console.log(msg);

export const fail = (msg: string) => {
  console.error(chalk.red('✗'), msg);
  appendLog('ERROR', msg);
};

export const warn = (msg: string) => {
  console.error(chalk.yellow('⚠'), msg);
  appendLog('WARN', msg);
};

export function heading(msg: string): void {
  console.log();
  console.log(chalk.bold(msg));
}
