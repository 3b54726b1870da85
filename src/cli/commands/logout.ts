import chalk from "chalk";
import { loadConfig } from "../../config/configManager.js";
import { expandPath } from "../../config/paths.js";
import { removeFile } from "../../shared/fs.js";

/**
 * Handles the logout command: deletes the saved session vault.
 */
export async function logoutCommand(options: { vault?: string | undefined }): Promise<void> {
  console.log(chalk.blue("\n🔓 Logging out...\n"));

  const vaultPath = expandPath(options.vault ?? loadConfig().vaultPath);

  if (await removeFile(vaultPath)) {
    console.log(chalk.green("✅ Saved session removed.\n"));
  } else {
    console.log(chalk.yellow("⚠️  No saved session found.\n"));
    console.log(chalk.gray(`   Looked for ${vaultPath}\n`));
  }
}
