/**
 * Routing Layer
 *
 * Maps request paths and methods to handlers, extracting typed path
 * parameters along the way.
 */

export { Router } from './router.ts';
export {
  createRoute,
  parsePath,
  paramTypes,
  splitPath,
  type PathSegment,
  type Route,
  type RouteMatch,
} from './route.ts';
export { CONVERTERS, accepts, convertParam, resolveParamType, type ParamType } from './params.ts';
