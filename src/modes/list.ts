import { createConsoleOutput } from '../ui/output.js';
import { createPrompter } from '../ui/prompt.js';
import { formatVMTable } from '../ui/table.js';
import { describeError } from '../utils/describeError.js';
import { closeSession, openSession, type SessionOptions } from './bootstrap.js';

/**
 * One-shot mode: print the inventory table (optionally filtered) and exit.
 */
export async function listMode(nameFilter: string | undefined, options: SessionOptions): Promise<void> {
  const out = createConsoleOutput(options.verbose);
  const prompt = createPrompter();

  try {
    const opened = await openSession(options, prompt, out);
    if (!opened) {
      return;
    }

    try {
      const vms = await opened.session.listVMs(nameFilter);
      out.line();
      if (nameFilter && vms.length === 0) {
        out.line(`No VMs found matching '${nameFilter}'`);
      } else {
        for (const line of formatVMTable(vms)) {
          out.line(line);
        }
      }
    } finally {
      await closeSession(opened.session, out);
    }
  } catch (error) {
    out.error(`❌ ${describeError(error)}`);
    process.exitCode = 1;
  } finally {
    prompt.close();
  }
}
