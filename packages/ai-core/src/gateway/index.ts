export {
  BILLING_SIGNATURES,
  codeFromHttpStatus,
  fromHttpStatus,
  fromProviderError,
  GatewayError,
  type GatewayErrorCode,
  type GatewayErrorOptions,
  isBillingError,
  isGatewayError,
  matchesBillingSignature,
} from "./errors";
