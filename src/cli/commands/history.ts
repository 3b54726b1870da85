import chalk from "chalk";
import { DownloadHistory } from "../../state/history.js";

export interface HistoryOptions {
  clear?: boolean | undefined;
}

/**
 * Lists the download history, or clears it with --clear.
 * A course id limits either to one course.
 */
export function historyCommand(courseId: string | undefined, options: HistoryOptions): void {
  const history = new DownloadHistory();

  try {
    if (options.clear) {
      const removed = history.clear(courseId);
      console.log(chalk.green(`\n✅ Removed ${removed} entries from the history.\n`));
      return;
    }

    const records = history.list(courseId);
    console.log(chalk.blue(`\n🗂️  Download history (${records.length} videos)\n`));

    for (const record of records) {
      console.log(`   ${chalk.gray(record.downloadedAt.slice(0, 10))}  ${chalk.cyan(record.courseId)}`);
      console.log(chalk.gray(`      ${record.destination}`));
    }
    console.log();
  } finally {
    history.close();
  }
}
