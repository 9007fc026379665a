import chalk from "chalk";

export interface Logger {
	info(message: string): void;
	success(message: string): void;
	warn(message: string): void;
	error(message: string): void;
}

/**
 * Console logger tagging every line with the program name.
 */
export function createConsoleLogger(tag = "[subscriber]"): Logger {
	return {
		info: (message) => console.log(chalk.cyan(`${tag} ${message}`)),
		success: (message) => console.log(chalk.green(`${tag} ${message}`)),
		warn: (message) => console.warn(chalk.yellow(`${tag} ${message}`)),
		error: (message) => console.error(chalk.red(`${tag} ${message}`)),
	};
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
