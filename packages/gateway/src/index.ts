// packages/gateway/src/index.ts

export { ContentGateway } from './gateway.js';
export type { ContentGatewayOptions } from './gateway.js';

export { FetchTransport } from './transport.js';
export type { FetchLike, FetchTransportOptions } from './transport.js';

export { HmacRequestSigner, canonicalRequestString } from './signer.js';

export {
  parseTranslations,
  parseColors,
  parseImages,
  parseRecords,
  parseAuth,
  parseLanguages,
} from './parse.js';

export { GatewayError, RequestTimeoutError, HttpStatusError, ResponseFormatError } from './errors.js';
export type { GatewayErrorCode } from './errors.js';

export type {
  ResourceKind,
  HttpMethod,
  OutboundRequest,
  HttpResponse,
  HttpTransport,
  RequestSigner,
  Credentials,
  Session,
  AuthResult,
  ResourcePayload,
  PreparedRequest,
  HandshakePayload,
} from './types.js';
