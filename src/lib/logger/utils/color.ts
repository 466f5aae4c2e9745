import chalk from 'chalk';
import type { LogType } from '../types';

type Painter = (text: string) => string;

const painters: Record<Exclude<LogType, 'raw'>, Painter> = {
  error: chalk.red,
  warn: chalk.yellow,
  notice: chalk.blue,
  success: chalk.green,
  info: chalk.white,
  debug: chalk.gray,
};

export function colorize(type: Exclude<LogType, 'raw'>, text: string): string {
  return painters[type](text);
}
