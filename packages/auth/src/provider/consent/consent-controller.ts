/**
 * Consent endpoint: shows the pending request to the operator and turns their
 * decision into a redirect back to the client.
 *
 * Transaction states: PENDING until the operator approves or denies with the
 * right password (both consume it) or until it outlives the pending TTL.
 * A wrong password or an unknown action keeps the transaction usable.
 */
import {
  ConsentActions,
  OAuthErrorCodes,
  type PendingAuthorization,
} from '@courier-mcp/models';
import { createLogger } from '@courier-mcp/core';
import { OAuthUtils } from '../../utils/index.js';
import type { PendingAuthorizationStore } from '../storage/pending-authorization-store.js';
import type { GrantExchanger } from '../token-utils/index.js';
import { createConsentPageData, renderConsentPage } from '../ui/consent-template.js';

const logger = createLogger('oauth:consent');

export const ConsentMessages = {
  MISSING_TRANSACTION: 'Missing transaction id',
  EXPIRED_TRANSACTION: 'Authorization request has expired. Restart the OAuth flow.',
  INVALID_FORM: 'Invalid consent form submission.',
  WRONG_PASSWORD: 'Incorrect authorization password.',
  UNSUPPORTED_ACTION: 'Unsupported action.',
  DENIED: 'The resource owner denied the request.',
} as const;

export interface ConsentControllerOptions {
  pending: PendingAuthorizationStore;
  grants: GrantExchanger;
  consentPassword: string;
  serviceName: string;
}

const textResponse = (body: string, status: number): Response =>
  new Response(body, {
    status,
    headers: { 'Content-Type': 'text/plain; charset=utf-8' },
  });

const redirectResponse = (location: string): Response =>
  new Response(null, {
    status: 302,
    headers: { Location: location, 'Cache-Control': 'no-store' },
  });

const formValue = (form: FormData, name: string): string | undefined => {
  const value = form.get(name);
  return typeof value === 'string' ? value : undefined;
};

export class ConsentController {
  public constructor(private readonly options: ConsentControllerOptions) {}

  public async handle(request: Request): Promise<Response> {
    if (request.method === 'GET') {
      return this.showConsent(request);
    }
    if (request.method === 'POST') {
      return this.submitConsent(request);
    }
    return new Response(null, { status: 405, headers: { Allow: 'GET, POST' } });
  }

  private showConsent(request: Request): Response {
    const tx = new URL(request.url).searchParams.get('tx');
    if (!tx) {
      return textResponse(ConsentMessages.MISSING_TRANSACTION, 400);
    }

    const pending = this.options.pending.get(tx);
    if (!pending) {
      return textResponse(ConsentMessages.EXPIRED_TRANSACTION, 400);
    }

    return this.renderPage(tx, pending);
  }

  private async submitConsent(request: Request): Promise<Response> {
    let form: FormData;
    try {
      form = await request.formData();
    } catch (error) {
      logger.warn(
        { error: error instanceof Error ? error.message : String(error) },
        'Unreadable consent form',
      );
      return textResponse(ConsentMessages.INVALID_FORM, 400);
    }

    const tx = new URL(request.url).searchParams.get('tx') || formValue(form, 'tx');
    if (!tx) {
      return textResponse(ConsentMessages.MISSING_TRANSACTION, 400);
    }

    const pending = this.options.pending.get(tx);
    if (!pending) {
      return textResponse(ConsentMessages.EXPIRED_TRANSACTION, 400);
    }

    const password = formValue(form, 'password') ?? '';
    if (!OAuthUtils.safeCompare(password, this.options.consentPassword)) {
      logger.warn({ client_id: pending.client.client_id }, 'Consent rejected: wrong password');
      return this.renderPage(tx, pending, ConsentMessages.WRONG_PASSWORD);
    }

    const action = formValue(form, 'action') ?? ConsentActions.APPROVE;
    if (action !== ConsentActions.APPROVE && action !== ConsentActions.DENY) {
      return this.renderPage(tx, pending, ConsentMessages.UNSUPPORTED_ACTION);
    }

    const decided = this.options.pending.take(tx);
    if (!decided) {
      return textResponse(ConsentMessages.EXPIRED_TRANSACTION, 400);
    }

    const { client, params } = decided;

    if (action === ConsentActions.DENY) {
      logger.info({ client_id: client.client_id }, 'Consent denied');
      return redirectResponse(
        OAuthUtils.constructRedirectUri(params.redirect_uri, {
          error: OAuthErrorCodes.ACCESS_DENIED,
          error_description: ConsentMessages.DENIED,
          state: params.state,
        }),
      );
    }

    const code = this.options.grants.mintAuthorizationCode(decided);
    logger.info({ client_id: client.client_id, scopes: decided.scopes }, 'Consent approved');

    return redirectResponse(
      OAuthUtils.constructRedirectUri(params.redirect_uri, {
        code: code.code,
        state: params.state,
      }),
    );
  }

  private renderPage(tx: string, pending: PendingAuthorization, error?: string): Response {
    const html = renderConsentPage(
      createConsentPageData(tx, pending, this.options.serviceName, error),
    );
    return new Response(html, {
      status: 200,
      headers: {
        'Content-Type': 'text/html; charset=utf-8',
        'Cache-Control': 'no-store',
      },
    });
  }
}
