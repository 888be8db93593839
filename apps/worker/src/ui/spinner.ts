// apps/worker/src/ui/spinner.ts — progress spinner for one-shot commands
import ora from "ora";
import type { Ora } from "ora";
import pc from "picocolors";

export interface Spinner {
  start(text: string): void;
  succeed(text: string): void;
  fail(text: string): void;
}

/**
 * Animated on a terminal; plain status lines otherwise (CI, piped output,
 * process supervisors), so one-shot commands still leave a readable trace.
 */
export function createSpinner(interactive = Boolean(process.stderr.isTTY)): Spinner {
  if (!interactive) {
    return {
      start(text: string) {
        console.error(`… ${text}`);
      },
      succeed(text: string) {
        console.error(`${pc.green("✔")} ${text}`);
      },
      fail(text: string) {
        console.error(`${pc.red("✖")} ${text}`);
      },
    };
  }

  let instance: Ora | undefined;

  return {
    start(text: string) {
      if (instance) {
        instance.text = text;
        return;
      }
      instance = ora({ text, stream: process.stderr }).start();
    },
    succeed(text: string) {
      instance?.succeed(text);
      instance = undefined;
    },
    fail(text: string) {
      instance?.fail(text);
      instance = undefined;
    },
  };
}
