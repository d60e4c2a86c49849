import {
  categorizeOption,
  dispatchOperation,
  handleInfoOption,
  MAIN_MENU,
  parseMenuChoice,
  renderMenu,
  VM_ACTIONS_MENU,
} from '../dispatcher/dispatcher.js';
import { createActionContext, type ActionContext } from '../session/context.js';
import { MenuLevel } from '../session/state.js';
import { createConsoleOutput } from '../ui/output.js';
import { createPrompter, InputClosedError } from '../ui/prompt.js';
import { formatAboutInfo, formatSessionInfo } from '../ui/table.js';
import { describeError } from '../utils/describeError.js';
import { closeSession, openSession, type SessionOptions } from './bootstrap.js';

export interface ConsoleOptions extends SessionOptions {
  taskTimeoutSeconds: number;
}

function printLines(ctx: ActionContext, lines: string[]): void {
  for (const line of lines) {
    ctx.out.line(line);
  }
}

/**
 * The numbered menu loop. Returns when the operator picks Exit or input
 * ends; any other error is reported and the loop carries on.
 */
export async function runMenuLoop(ctx: ActionContext): Promise<void> {
  let level: MenuLevel = MenuLevel.MAIN;

  while (true) {
    let activity = 'Menu';
    try {
      if (level === MenuLevel.VM_ACTIONS) {
        ctx.out.line();
        printLines(ctx, renderMenu(VM_ACTIONS_MENU));
        const entry = parseMenuChoice(VM_ACTIONS_MENU, await ctx.prompt.ask('Enter your option: '));
        if (!entry) {
          ctx.out.line('Invalid option. Please try again.');
          continue;
        }
        if (entry.value === null) {
          level = MenuLevel.MAIN;
          continue;
        }
        activity = entry.label;
        await dispatchOperation(entry.value, ctx);
        continue;
      }

      ctx.out.line();
      printLines(ctx, renderMenu(MAIN_MENU));
      const entry = parseMenuChoice(MAIN_MENU, await ctx.prompt.ask('Enter your option: '));
      if (!entry) {
        ctx.out.line('Invalid option. Please try again.');
        continue;
      }

      activity = entry.label;
      switch (categorizeOption(entry.value)) {
        case 'exit':
          ctx.out.line('Exiting program...');
          return;
        case 'action':
          level = MenuLevel.VM_ACTIONS;
          break;
        case 'info':
          await handleInfoOption(entry.value, ctx);
          break;
      }
    } catch (error) {
      if (error instanceof InputClosedError) {
        ctx.out.line('\nInput closed, exiting...');
        return;
      }
      ctx.out.error(`❌ ${activity} failed: ${describeError(error)}`);
    }
  }
}

/**
 * Interactive mode: connect, show vCenter and session details, then run the
 * menu loop until the operator exits.
 */
export async function consoleMode(options: ConsoleOptions): Promise<void> {
  const out = createConsoleOutput(options.verbose);
  const prompt = createPrompter();

  try {
    const opened = await openSession(options, prompt, out);
    if (!opened) {
      return;
    }

    const ctx = createActionContext(opened.session, prompt, out, {
      taskTimeoutMs: options.taskTimeoutSeconds * 1000,
    });

    try {
      out.line();
      printLines(ctx, formatAboutInfo(opened.session.about()));
      out.line();
      printLines(ctx, formatSessionInfo(await opened.session.currentSession(), opened.session.host));
      await runMenuLoop(ctx);
    } finally {
      await closeSession(opened.session, out);
    }
  } catch (error) {
    if (error instanceof InputClosedError) {
      out.line('\nInput closed, exiting...');
    } else {
      out.error(`❌ ${describeError(error)}`);
    }
    process.exitCode = 1;
  } finally {
    prompt.close();
  }
}
