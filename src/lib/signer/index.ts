export {
  createSigner,
  encodeQuery,
  hmacSha256Hex,
  type HttpMethod,
  type QueryParams,
  type SignableRequest,
  type SignatureParts,
  type SignedRequest,
  type Signer,
  type SignerConfig,
  type SigningContext,
  type SigningScheme,
  type SignOptions,
} from "./signer";
