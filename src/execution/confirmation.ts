import readline from 'readline';
import { OrderRequest } from '../core/types';

export interface OrderProposal {
  runId: string;
  iteration: number;
  accountId: string;
  portfolioId: string;
  orders: OrderRequest[];
  cashBefore: number;
  projectedCash: number;
}

/**
 * The one place a sync run suspends for an operator decision. Once `signal`
 * aborts, the provider stops waiting and resolves false.
 */
export interface ConfirmationProvider {
  confirm(proposal: OrderProposal, signal?: AbortSignal): Promise<boolean>;
}

export class AutoConfirmProvider implements ConfirmationProvider {
  async confirm(): Promise<boolean> {
    return true;
  }
}

export const CONFIRM_PROMPT = 'Do you wish to execute the suggested transactions (Y/n)? ';

/** Only an explicit `Y` or `y` confirms. */
export const isAffirmative = (answer: string) => answer.trim() === 'Y' || answer.trim() === 'y';

export class TerminalConfirmProvider implements ConfirmationProvider {
  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  confirm(_proposal: OrderProposal, signal?: AbortSignal): Promise<boolean> {
    const rl = readline.createInterface({ input: this.input, output: this.output });
    return new Promise((resolve) => {
      let answered = false;
      const onAbort = () => rl.close();
      rl.question(CONFIRM_PROMPT, (answer) => {
        answered = true;
        signal?.removeEventListener('abort', onAbort);
        rl.close();
        resolve(isAffirmative(answer));
      });
      // Closed input (EOF) or an interrupt counts as a decline.
      rl.on('close', () => {
        if (!answered) resolve(false);
      });
      if (signal?.aborted) rl.close();
      else signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
