export {
  joinRoutePath,
  parsePathTemplate,
  pathParamNames,
  pathShapeKey,
  matchPathSegments,
  type PathSegment,
} from "./path";
export {
  extractUserId,
  parseAuthorizationHeader,
  decodeBasicCredentials,
  type AuthorizationHeader,
} from "./auth";
export { defineService, descriptorToString } from "./descriptor";
