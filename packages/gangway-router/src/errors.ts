export type RouteTableErrorCode =
  | 'ROUTE_TABLE_EMPTY'
  | 'ROUTE_PREFIX_INVALID'
  | 'ROUTE_PREFIX_DUPLICATE'
  | 'ROUTE_RULE_SHADOWED'
  | 'ROUTE_FALLBACK_MISSING'
  | 'ROUTE_FALLBACK_NOT_LAST'
  | 'ROUTE_FALLBACK_NOT_STATIC';

export class RouteTableError extends Error {
  code: RouteTableErrorCode;

  constructor(message: string, code: RouteTableErrorCode) {
    super(message);
    this.name = 'RouteTableError';
    this.code = code;
  }
}

export class RouterConfigError extends Error {
  code: string;

  constructor(message: string, code: string = 'ROUTER_MISCONFIGURED') {
    super(message);
    this.name = 'RouterConfigError';
    this.code = code;
  }
}
