export {
  createResponse,
  isResponse,
  RESPONSE_BRAND,
  type Response,
  unwrap,
  usage,
  wrapOutcome,
} from "./response.js";
export { schemaVariant, type TaggedVariant, tagVariant, type VariantSpec, variantResolver } from "./variant.js";
