export type NavDataErrorCode =
  | 'UNKNOWN_RUNWAY_IN_ROUTE'
  | 'AMBIGUOUS_TERMINAL_AREA'
  | 'UNEXPECTED_ROUTE_TOKEN'
  | 'UNKNOWN_IDENT'
  | 'INVALID_RECORD';

export class NavDataError extends Error {
  readonly code: NavDataErrorCode;

  constructor(code: NavDataErrorCode, message: string) {
    super(message);
    this.name = 'NavDataError';
    this.code = code;
  }
}

export function unknownRunwayInRoute(airportIdent: string, runway: string): NavDataError {
  return new NavDataError(
    'UNKNOWN_RUNWAY_IN_ROUTE',
    `Unknown runway ${runway} for airport ${airportIdent} in route`
  );
}

export function ambiguousTerminalArea(waypoint: string, a: string, b: string): NavDataError {
  return new NavDataError(
    'AMBIGUOUS_TERMINAL_AREA',
    `Waypoint ${waypoint} is ambiguous between terminal areas ${a} and ${b}`
  );
}

export function unexpectedRouteToken(token: string): NavDataError {
  return new NavDataError('UNEXPECTED_ROUTE_TOKEN', `Unexpected route token ${token}`);
}

export function unknownIdent(ident: string): NavDataError {
  return new NavDataError('UNKNOWN_IDENT', `Unknown ident ${ident}`);
}

export function invalidRecord(field: string, detail: string): NavDataError {
  return new NavDataError('INVALID_RECORD', `Invalid ${field}: ${detail}`);
}

export function isNavDataError(error: unknown): error is NavDataError {
  return error instanceof NavDataError;
}
