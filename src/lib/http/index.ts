export {
  classifyNetworkFailure,
  classifyResponse,
  extractErrorBody,
  protocolError,
  reasonFromMessage,
  type BodyClassifier,
  type BodyClassifierContext,
  type ErrorBody,
} from "./classify";
export { parseJsonLossless, quoteLossyNumbers } from "./json";
export {
  createRestTransport,
  type FetchFn,
  type QueryValue,
  type RestRequest,
  type RestTransport,
  type RestTransportConfig,
  type RestTransportMetrics,
} from "./rest-transport";
