/**
 * @gitwire/smart-http
 *
 * Pluggable smart transport for git over HTTP(S). The host engine picks a
 * transport by URL scheme, asks it for one stream per protocol phase, and
 * reads and writes pkt-line bytes through it; this package does the HTTP
 * side: request construction, status and header parsing, content-type
 * checks, redirects and chunked decoding.
 *
 * @example
 * ```typescript
 * import { defaultTransportRegistry, registerHttpTransport, Service } from "@gitwire/smart-http";
 *
 * registerHttpTransport({ engine: "fetch" });
 *
 * const url = "https://example.com/repo.git";
 * const transport = defaultTransportRegistry.createTransport({ url });
 * const stream = await transport.action(url, Service.UploadPackLs);
 * const buffer = new Uint8Array(65536);
 * const n = await stream.read(buffer); // ref advertisement bytes
 * ```
 *
 * @packageDocumentation
 */

export {
  ChunkFormatError,
  ConnectionError,
  ContentTypeMismatchError,
  describeTransportError,
  HttpStatusError,
  ProtocolViolationError,
  RedirectRejectedError,
  ResponseParseError,
  TransportError,
  UnsupportedSchemeError,
  UrlParseError,
} from "./api/errors.js";
export {
  type ActionBinding,
  getActionBinding,
  getContentTypes,
  getExpectedContentType,
  type HttpMethod,
  isListingService,
  isService,
  Service,
  type ServiceName,
} from "./api/service.js";
export type {
  RemoteHandle,
  SmartSubtransport,
  SmartSubtransportStream,
  TransportLogger,
} from "./api/types.js";
export { BaseUrlCell, type BaseUrlState } from "./http/base-url-cell.js";
export { ChunkedTransferDecoder } from "./http/chunked-decoder.js";
export {
  checkContentType,
  type ExchangeRequest,
  type ExchangeResponse,
  formatUserAgent,
  type HttpExchange,
} from "./http/exchange.js";
export {
  FetchHttpExchange,
  type FetchFunction,
  type FetchHttpExchangeOptions,
} from "./http/fetch-exchange.js";
export {
  computeRedirectBase,
  type RedirectPolicy,
  resolveLocation,
} from "./http/redirect.js";
export {
  createHttpExchange,
  HTTP_SCHEMES,
  type HttpBackendOptions,
  registerHttpTransport,
} from "./http/register.js";
export {
  SmartHttpStream,
  SmartHttpTransport,
  type SmartHttpTransportOptions,
} from "./http/smart-http-transport.js";
export {
  type SocketFactory,
  SocketHttpExchange,
  type SocketHttpExchangeOptions,
  type SocketTarget,
  type TcpSocket,
} from "./http/socket-exchange.js";
export { BufferedByteReader } from "./streams/buffered-byte-reader.js";
export { type ByteSource, LengthLimitedSource, readAll } from "./streams/byte-source.js";
export { Transport, type TransportFactory } from "./transport/transport.js";
export {
  defaultTransportRegistry,
  registerTransport,
  TransportRegistry,
} from "./transport/transport-registry.js";
export { AsyncMutex } from "./utils/async-mutex.js";
export { VERSION } from "./version.js";
