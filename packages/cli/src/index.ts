/**
 * @fileoverview Main entry point for @taskforge/cli
 *
 * Exports the menu and formatting helpers for programmatic usage.
 */
export { TaskMenu, MENU_PROMPT, parseQuantity, type MenuIO } from './menu.js';
export { createReadlinePrompter, PromptClosedError, type Prompter } from './prompter.js';
export { parseCliArgs, HELP_TEXT, type CliArgs } from './args.js';
export * from './format.js';
