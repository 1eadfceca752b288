import { ambiguousTerminalArea, unexpectedRouteToken } from '@/lib/errors';
import { createLogger } from '@/lib/log';
import { sameNavAid, terminalArea, waypointNavAid } from '@/lib/nd/navaid';
import type { NavigationData } from '@/lib/nd/navigation-data';
import type { Airport, NavAid } from '@/lib/nd/types';
import { lex } from './lexer';
import type { Token, Word } from './token';

const log = createLogger('route');

const UNKNOWN_TERMINAL_AREA = 'ZZZZ';

type VfrWaypointWord = Extract<Word, { kind: 'vfrWaypoint' }>;

/** Lexes and tokenizes a route string. */
export function tokenize(route: string, nd: NavigationData): Token[] {
  return resolveWords(lex(route, nd), nd);
}

/**
 * Resolves words into tokens in one pass. The most recent airport opens a
 * terminal scope that a direct routing closes again; VFR waypoints are
 * looked up in that scope and in the scope of the next airport ahead.
 */
export function resolveWords(words: readonly Word[], nd: NavigationData): Token[] {
  const tokens: Token[] = [];
  let terminal: Airport | null = null;

  words.forEach((word, i) => {
    switch (word.kind) {
      case 'speed':
      case 'level':
      case 'wind':
      case 'navAid':
        tokens.push(word);
        break;

      case 'via':
        terminal = null;
        tokens.push(word);
        break;

      case 'airport': {
        terminal = word.airport;
        // An airport reached direct and followed by one of its waypoints only opens the scope.
        if (i > 0 && words[i - 1].kind === 'via' && words[i + 1]?.kind === 'vfrWaypoint') {
          log.debug(`${word.airport.icaoIdent} only opens its terminal area`);
        } else {
          tokens.push(word);
        }
        break;
      }

      case 'vfrWaypoint': {
        const ahead = lookaheadTerminalArea(words.slice(i + 1));
        const inCurrent = terminal ? nd.findTerminalWaypoint(terminal.icaoIdent, word.ident) : null;
        const inNext = ahead ? nd.findTerminalWaypoint(ahead.icaoIdent, word.ident) : null;
        tokens.push({ kind: 'navAid', navAid: pickTerminalWaypoint(word, inCurrent, inNext) });
        break;
      }
    }
  });

  return tokens;
}

function pickTerminalWaypoint(
  word: VfrWaypointWord,
  inCurrent: NavAid | null,
  inNext: NavAid | null
): NavAid {
  if (inCurrent && inNext) {
    if (sameNavAid(inCurrent, inNext)) return inCurrent;
    throw ambiguousTerminalArea(word.ident, areaOf(inCurrent), areaOf(inNext));
  }
  return inCurrent ?? inNext ?? fallback(word);
}

function areaOf(navAid: NavAid): string {
  const area = navAid.kind === 'waypoint' ? terminalArea(navAid.waypoint) : null;
  return area ?? UNKNOWN_TERMINAL_AREA;
}

// Outside any matching terminal area the first waypoint of that name wins.
function fallback(word: VfrWaypointWord): NavAid {
  if (!word.waypoint) throw unexpectedRouteToken(word.ident);
  log.debug(`${word.ident} is not in a terminal area on the route, using the first match`);
  return waypointNavAid(word.waypoint);
}

/** The next airport before any direct routing. */
function lookaheadTerminalArea(words: readonly Word[]): Airport | null {
  for (const word of words) {
    if (word.kind === 'airport') return word.airport;
    if (word.kind === 'via') return null;
  }
  return null;
}
