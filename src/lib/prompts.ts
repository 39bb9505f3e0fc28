import { confirm, input, select } from "@inquirer/prompts";
import { expandHome } from "./paths.js";

/**
 * Interactive questions asked during setup.
 */
export interface Prompter {
  input(message: string, defaultValue?: string): Promise<string>;
  confirm(message: string, defaultValue: boolean): Promise<boolean>;
  select(message: string, choices: SelectChoice[], defaultValue?: string): Promise<string>;
}

export interface SelectChoice {
  name: string;
  value: string;
}

export class InquirerPrompter implements Prompter {
  async input(message: string, defaultValue?: string): Promise<string> {
    return input({ message, default: defaultValue });
  }

  async confirm(message: string, defaultValue: boolean): Promise<boolean> {
    return confirm({ message, default: defaultValue });
  }

  async select(message: string, choices: SelectChoice[], defaultValue?: string): Promise<string> {
    return select({ message, choices, default: defaultValue });
  }
}

// Sentinel values for the extra entries appended to selection lists
export const SKIP_CHOICE = "__skip__";
export const OTHER_CHOICE = "__other__";

/**
 * Ask for a folder path. A blank answer takes the default (expanded), or
 * skips the folder when there is none.
 */
export async function getUserPath(
  prompter: Prompter,
  folderName: string,
  defaultPath?: string
): Promise<string | null> {
  const expandedDefault = defaultPath ? expandHome(defaultPath) : undefined;
  const message = expandedDefault
    ? `Enter path for ${folderName}`
    : `Enter path for ${folderName} (empty to skip)`;
  const response = (await prompter.input(message, expandedDefault)).trim();

  if (response) return expandHome(response);
  return expandedDefault ?? null;
}

export interface SelectionOptions {
  defaultValue?: string;
  options?: string[];
}

/**
 * Pick from a list of options, or type a value when there are none.
 * Returns null when the user skips.
 */
export async function getUserSelection(
  prompter: Prompter,
  message: string,
  { defaultValue, options }: SelectionOptions = {}
): Promise<string | null> {
  if (options && options.length > 0) {
    const choices: SelectChoice[] = [
      ...options.map((option) => ({ name: option, value: option })),
      { name: "Other path...", value: OTHER_CHOICE },
      { name: "Skip", value: SKIP_CHOICE }
    ];
    const initial = defaultValue && options.includes(defaultValue) ? defaultValue : undefined;
    const picked = await prompter.select(message, choices, initial);
    if (picked === SKIP_CHOICE) return null;
    if (picked !== OTHER_CHOICE) return picked;
    return getUserSelection(prompter, "Enter path");
  }

  const label = defaultValue ? message : `${message} (empty to skip)`;
  const response = (await prompter.input(label, defaultValue)).trim();
  if (response) return response;
  return defaultValue ?? null;
}

export async function getUserConfirmation(
  prompter: Prompter,
  message: string,
  skipPrompt: boolean,
  defaultValue = false
): Promise<boolean> {
  if (skipPrompt) return true;
  return prompter.confirm(message, defaultValue);
}
