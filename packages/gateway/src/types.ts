import type { DataRecord, ResourceEntries } from '@cmsync/content-state';

export type ResourceKind = 'translation' | 'color' | 'image' | 'store';

export type HttpMethod = 'GET' | 'POST';

export type OutboundRequest = {
  method: HttpMethod;
  path: string; // path relative to the base URL, used for signing
  url: string;
  headers: Record<string, string>;
  body?: string;
};

export type HttpResponse = {
  status: number;
  body: string;
};

export interface HttpTransport {
  send(req: OutboundRequest, opts: { timeoutMs: number }): Promise<HttpResponse>;
}

export interface RequestSigner {
  /** Returns the value of the `X-Signature` header for `message`. */
  sign(message: string): string;
}

export type Credentials = {
  projectId: string;
  apiKey: string;
  projectSecret: string;
};

export type Session = {
  projectId: string;
  token: string;
};

export type AuthResult = {
  token: string;
  tabs: string[];
  stores: string[];
  availableLanguages: string[];
};

export type ResourcePayload =
  | { kind: 'entries'; entries: ResourceEntries }
  | { kind: 'records'; records: DataRecord[] };

/** A fully formed request plus the parser for its expected response body. */
export type PreparedRequest<T> = {
  request: OutboundRequest;
  parse(body: string): T;

  /** Value to use when the server answers 404 (resource exists but is empty). */
  notFound?: () => T;
};

export type HandshakePayload = {
  projectId: string;
  signature?: string;
};
