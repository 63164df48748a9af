import crypto from 'crypto';
import express from 'express';
import { ConfirmationProvider, OrderProposal } from '../execution/confirmation';
import { renderOrders } from './render';

export interface ApprovalServerOptions {
  port: number;
  bind: string;
  csrfToken?: string;
  /** Receives the base URL once the server is listening. */
  onListening?: (url: string) => void;
}

const escapeHtml = (value: string) =>
  value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');

const readToken = (req: express.Request): string | undefined => {
  const fromBody: unknown = req.body?.csrfToken;
  if (typeof fromBody === 'string') return fromBody;
  return req.get('x-csrf-token');
};

/** Express app for one proposal; the first valid approve/reject wins. */
export const createApprovalApp = (
  proposal: OrderProposal,
  csrfToken: string,
  onDecision: (approved: boolean) => void
): express.Express => {
  const app = express();
  let decided = false;

  app.get('/', (_req, res) => {
    const body = escapeHtml(renderOrders(proposal.orders));
    res.send(`<!doctype html>
<html><body>
<h1>Run ${escapeHtml(proposal.runId)} · iteration ${proposal.iteration}</h1>
<p>Account ${escapeHtml(proposal.accountId)} · portfolio ${escapeHtml(proposal.portfolioId)}</p>
<pre>${body}</pre>
<p>Cash ${proposal.cashBefore.toFixed(2)} → projected ${proposal.projectedCash.toFixed(2)}</p>
<form method="post" action="/approve"><input type="hidden" name="csrfToken" value="${csrfToken}"><button>Approve</button></form>
<form method="post" action="/reject"><input type="hidden" name="csrfToken" value="${csrfToken}"><button>Reject</button></form>
</body></html>`);
  });

  app.get('/proposal', (_req, res) => {
    res.json({ ...proposal, csrfToken, decided });
  });

  const decide = (approved: boolean) => (req: express.Request, res: express.Response) => {
    if (readToken(req) !== csrfToken) return res.status(403).send('Invalid CSRF token');
    if (decided) return res.status(409).send('Decision already recorded');
    decided = true;
    res.json({ runId: proposal.runId, iteration: proposal.iteration, approved });
    onDecision(approved);
  };

  const parsers = [express.urlencoded({ extended: false }), express.json()];
  app.post('/approve', ...parsers, decide(true));
  app.post('/reject', ...parsers, decide(false));
  return app;
};

/** Serves the proposal over HTTP and resolves with the operator's decision. */
export class HttpApprovalProvider implements ConfirmationProvider {
  constructor(private readonly options: ApprovalServerOptions) {}

  confirm(proposal: OrderProposal, signal?: AbortSignal): Promise<boolean> {
    const csrfToken = this.options.csrfToken ?? crypto.randomUUID();
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        resolve(false);
        return;
      }
      const finish = (approved: boolean) => {
        signal?.removeEventListener('abort', onAbort);
        server.close();
        resolve(approved);
      };
      const onAbort = () => {
        console.warn(`Approval for run ${proposal.runId} interrupted; closing the approval page`);
        finish(false);
      };
      const app = createApprovalApp(proposal, csrfToken, finish);
      signal?.addEventListener('abort', onAbort, { once: true });
      const server = app.listen(this.options.port, this.options.bind, () => {
        const address = server.address();
        const port = address && typeof address === 'object' ? address.port : this.options.port;
        const url = `http://${this.options.bind}:${port}`;
        console.log(`Awaiting approval for run ${proposal.runId} at ${url}`);
        this.options.onListening?.(url);
      });
      server.on('error', reject);
    });
  }
}
