import chalk from 'chalk';
import { config } from '@/config';

export interface ILogger {
	readonly name: string;
	readonly verbose: boolean;

	info(message: string): void;
	success(message: string): void;
	warn(message: string): void;
	error(message: string): void;
	debug(message: string): void;
}

const loggerMap: Record<string, ILogger> = {};

class Logger implements ILogger {
	constructor(
		readonly name: string,
		readonly verbose: boolean
	) {}

	info(message: string): void {
		console.log(chalk.blue(`[INFO] ${this.name} :: ${message}`));
	}

	success(message: string): void {
		console.log(chalk.green(`[SUCCESS] ${this.name} :: ${message}`));
	}

	warn(message: string): void {
		console.warn(chalk.yellow(`[WARNING] ${this.name} :: ${message}`));
	}

	error(message: string): void {
		console.error(chalk.red(`[ERROR] ${this.name} :: ${message}`));
	}

	debug(message: string): void {
		if (this.verbose) {
			console.log(chalk.magenta(`[DEBUG] ${this.name} :: ${message}`));
		}
	}
}

/**
 * Returns the logger registered under `name`, creating it on first use.
 * Later calls with the same name get the same instance, whatever
 * `verbose` they pass.
 *
 * @param name - Prefix printed before every message.
 * @param verbose - Whether `debug` messages are printed. Defaults to `config.logging.verbose`.
 */
export function getLogger(name: string, verbose = config.logging.verbose): ILogger {
	let logger = loggerMap[name];

	if (!logger) {
		logger = new Logger(name, verbose);
		loggerMap[name] = logger;
	}

	return logger;
}
