import inquirer from "inquirer";
import { parseSelectionSpec } from "../selection/selection.js";
import type { Credentials } from "../session/provider.js";
import { errorMessage } from "../shared/errors.js";

// ============================================
// Interactive prompts - not unit testable
// ============================================
/* v8 ignore start */

export async function promptCredentials(): Promise<Credentials> {
  const answers = await inquirer.prompt<{ username: string; password: string }>([
    {
      type: "input",
      name: "username",
      message: "E-mail or user name:",
      validate: (input: string) => (input.trim().length > 0 ? true : "Please enter a user name"),
    },
    {
      type: "password",
      name: "password",
      message: "Password (leave empty to type it in the browser):",
      mask: "*",
    },
  ]);

  return {
    username: answers.username.trim(),
    ...(answers.password ? { password: answers.password } : {}),
  };
}

/**
 * Asks for the passphrase of an existing vault.
 * An empty answer skips the vault and logs in again.
 */
export async function promptVaultPassphrase(): Promise<string | undefined> {
  const { passphrase } = await inquirer.prompt<{ passphrase: string }>([
    {
      type: "password",
      name: "passphrase",
      message: "Passphrase for the saved session (leave empty to log in):",
      mask: "*",
    },
  ]);
  return passphrase || undefined;
}

/**
 * Offers to save the session. Returns the chosen passphrase, or null.
 */
export async function promptPersistence(): Promise<string | null> {
  const { save } = await inquirer.prompt<{ save: boolean }>([
    {
      type: "confirm",
      name: "save",
      message: "Save this session (encrypted) for next time?",
      default: true,
    },
  ]);
  if (!save) {
    return null;
  }

  const { passphrase } = await inquirer.prompt<{ passphrase: string }>([
    {
      type: "password",
      name: "passphrase",
      message: "Choose a passphrase:",
      mask: "*",
      validate: (input: string) => (input.length > 0 ? true : "The passphrase must not be empty"),
    },
  ]);
  await inquirer.prompt<{ repeated: string }>([
    {
      type: "password",
      name: "repeated",
      message: "Repeat the passphrase:",
      mask: "*",
      validate: (input: string) => (input === passphrase ? true : "Passphrases do not match"),
    },
  ]);
  return passphrase;
}

/**
 * Asks which lectures to download. Invalid specs are rejected in place,
 * so the returned text always parses.
 */
export async function promptSelection(): Promise<string> {
  const { selection } = await inquirer.prompt<{ selection: string }>([
    {
      type: "input",
      name: "selection",
      message: 'Lectures to download ("all", or numbers and ranges like "1 3-5"):',
      default: "all",
      validate: (input: string) => {
        try {
          parseSelectionSpec(input);
          return true;
        } catch (error) {
          return errorMessage(error);
        }
      },
    },
  ]);
  return selection;
}

/* v8 ignore stop */
