import chalk from "chalk";
import cliProgress from "cli-progress";

export interface ReceiveProgress {
	faults: number;
	reconnects: number;
}

/**
 * Create a progress bar counting received against expected messages.
 */
export function createReceiveProgressBar(label: string): cliProgress.SingleBar {
	return new cliProgress.SingleBar(
		{
			format: `${chalk.cyan(label)} ${chalk.gray("|")} {bar} ${chalk.gray("|")} {value}/{total} (${chalk.red("✗")} {faults} ${chalk.yellow("↻")} {reconnects})`,
			barCompleteChar: "█",
			barIncompleteChar: "░",
			hideCursor: true,
			clearOnComplete: false,
			stopOnComplete: false,
		},
		cliProgress.Presets.shades_classic,
	);
}

export function startProgressBar(bar: cliProgress.SingleBar, total: number): void {
	bar.start(total, 0, { faults: 0, reconnects: 0 });
}

export function updateProgressBar(bar: cliProgress.SingleBar, received: number, progress: ReceiveProgress): void {
	bar.update(received, { ...progress });
}

export function stopProgressBar(bar: cliProgress.SingleBar): void {
	bar.stop();
}
