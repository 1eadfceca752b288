import type { Speed, Wind } from '@/lib/core/measurements';
import { formatSpeed, formatWind } from '@/lib/core/measurements';
import { formatVerticalDistance, type VerticalDistance } from '@/lib/core/vertical-distance';
import { navAidIdent } from '@/lib/nd/navaid';
import type { Airport, NavAid, Runway, Waypoint } from '@/lib/nd/types';

export type Via = 'direct';

/** A route element with every reference resolved. */
export type Token =
  | { kind: 'speed'; speed: Speed }
  | { kind: 'level'; level: VerticalDistance }
  | { kind: 'wind'; wind: Wind }
  | { kind: 'airport'; airport: Airport; runway: Runway | null }
  | { kind: 'navAid'; navAid: NavAid }
  | { kind: 'via'; via: Via };

/** A classified route element before terminal scopes are known. */
export type Word = Token | { kind: 'vfrWaypoint'; ident: string; waypoint: Waypoint | null };

function padded(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

function formatLevel(level: VerticalDistance): string {
  switch (level.kind) {
    case 'fl':
      return `F${padded(level.value, 3)}`;
    case 'altitude':
      return `A${padded(Math.round(level.value / 100), 3)}`;
    default:
      return formatVerticalDistance(level);
  }
}

/** Renders a token in route syntax, e.g. N0107, A025, EDHL07 or DCT. */
export function formatToken(token: Token): string {
  switch (token.kind) {
    case 'speed':
      return formatSpeed(token.speed);
    case 'level':
      return formatLevel(token.level);
    case 'wind':
      return formatWind(token.wind);
    case 'airport':
      return `${token.airport.icaoIdent}${token.runway?.designator ?? ''}`;
    case 'navAid':
      return navAidIdent(token.navAid);
    case 'via':
      return 'DCT';
  }
}
