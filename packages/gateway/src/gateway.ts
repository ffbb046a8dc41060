// packages/gateway/src/gateway.ts
import type {
  AuthResult,
  Credentials,
  HandshakePayload,
  HttpMethod,
  OutboundRequest,
  PreparedRequest,
  RequestSigner,
  ResourceKind,
  ResourcePayload,
  Session,
} from './types.js';
import { canonicalRequestString } from './signer.js';
import { parseAuth, parseColors, parseImages, parseLanguages, parseRecords, parseTranslations } from './parse.js';

export type ContentGatewayOptions = {
  baseUrl: string;
};

function joinUrl(baseUrl: string, p: string): string {
  return `${baseUrl.replace(/\/+$/, '')}${p}`;
}

function seg(s: string): string {
  return encodeURIComponent(s);
}

function parserFor(kind: ResourceKind): (body: string) => ResourcePayload {
  switch (kind) {
    case 'translation':
      return (body) => ({ kind: 'entries', entries: parseTranslations(body) });
    case 'color':
      return (body) => ({ kind: 'entries', entries: parseColors(body) });
    case 'image':
      return (body) => ({ kind: 'entries', entries: parseImages(body) });
    case 'store':
      return (body) => ({ kind: 'records', records: parseRecords(body) });
  }
}

function emptyPayload(kind: ResourceKind): ResourcePayload {
  return kind === 'store' ? { kind: 'records', records: [] } : { kind: 'entries', entries: {} };
}

/**
 * Builds authenticated requests for each resource kind.
 *
 * Content requests need a session (project id + token); without one the builders
 * return null. The auth request carries credentials in its body and no
 * Authorization header.
 */
export class ContentGateway {
  private readonly baseUrl: string;
  private session: Session | null = null;
  private signer: RequestSigner | null = null;

  constructor(opts: ContentGatewayOptions) {
    this.baseUrl = opts.baseUrl;
  }

  configure(session: Session, signer: RequestSigner | null): void {
    this.session = { ...session };
    this.signer = signer;
  }

  reset(): void {
    this.session = null;
    this.signer = null;
  }

  isConfigured(): boolean {
    return this.session !== null;
  }

  get projectId(): string | null {
    return this.session?.projectId ?? null;
  }

  buildAuthRequest(creds: Credentials, signer: RequestSigner | null): PreparedRequest<AuthResult> {
    const body = JSON.stringify({
      apiKey: creds.apiKey,
      projectId: creds.projectId,
      projectSecret: creds.projectSecret,
    });

    const request = this.makeRequest('POST', '/auth', { 'Content-Type': 'application/json' }, body, signer);
    return { request, parse: parseAuth };
  }

  buildResourceRequest(kind: ResourceKind, resourceId: string): PreparedRequest<ResourcePayload> | null {
    const session = this.session;
    if (!session) return null;

    const request = this.makeRequest(
      'GET',
      `/resource/${seg(session.projectId)}/${seg(resourceId)}`,
      { Authorization: `Bearer ${session.token}` },
      undefined,
      this.signer
    );

    return { request, parse: parserFor(kind), notFound: () => emptyPayload(kind) };
  }

  buildLanguagesRequest(): PreparedRequest<string[]> | null {
    const session = this.session;
    if (!session) return null;

    const request = this.makeRequest(
      'GET',
      `/languages/${seg(session.projectId)}`,
      { Authorization: `Bearer ${session.token}` },
      undefined,
      this.signer
    );
    return { request, parse: parseLanguages };
  }

  /** Body of the realtime `handshake` message, signed over the project id. */
  handshakePayload(): HandshakePayload | null {
    const session = this.session;
    if (!session) return null;

    const payload: HandshakePayload = { projectId: session.projectId };
    if (this.signer) payload.signature = this.signer.sign(session.projectId);
    return payload;
  }

  private makeRequest(
    method: HttpMethod,
    p: string,
    extraHeaders: Record<string, string>,
    body: string | undefined,
    signer: RequestSigner | null
  ): OutboundRequest {
    const headers: Record<string, string> = { Accept: 'application/json', ...extraHeaders };
    const req: OutboundRequest = { method, path: p, url: joinUrl(this.baseUrl, p), headers };
    if (body !== undefined) req.body = body;

    if (signer) headers['X-Signature'] = signer.sign(canonicalRequestString(req));
    return req;
  }
}
