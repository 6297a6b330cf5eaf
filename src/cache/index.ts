export { TtlCache, cacheKey } from "./ttlCache";
