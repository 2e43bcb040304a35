/**
 * Player script pattern matching
 *
 * Locates the descrambling function in a downloaded player script and maps
 * each helper call it makes to a cipher operation. Returns null when the
 * script no longer has the expected shape.
 */

import type { CipherOperation } from '../../../domain/resolution';

const PLAYER_ORIGIN = 'https://www.youtube.com';
const PLAYER_PATH_PATTERN = /"jsUrl":"(\/s\/player\/[^"]+)"/;

const DESCRAMBLE_FUNCTION_PATTERNS = [
  /([a-zA-Z0-9$]+)=function\(a\)\{a=a\.split\(""\);(.*?)return a\.join\(""\)\}/s,
  /\b([a-zA-Z0-9$]+)\s*=\s*function\(\s*a\s*\)\s*\{\s*a\s*=\s*a\.split\(""\)\s*;(.*?)return\s*a\.join\(""\)\s*\}/s
];

const HELPER_NAME_PATTERN = /([a-zA-Z0-9$]+)\./;
const HELPER_METHOD_PATTERN = /([a-zA-Z0-9$]+)\s*:\s*function\s*\(([^)]*)\)\s*\{([^}]*)\}/g;

type OperationKind = CipherOperation['op'];

export function findPlayerUrl(embedPage: string): string | null {
  const match = embedPage.match(PLAYER_PATH_PATTERN);
  if (!match) return null;
  return `${PLAYER_ORIGIN}${match[1].replace(/\\\//g, '/')}`;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function classifyMethod(body: string): OperationKind | null {
  if (body.includes('reverse')) return 'reverse';
  if (body.includes('splice')) return 'splice';
  if (/%\s*a\.length/.test(body)) return 'swap';
  return null;
}

/**
 * Read the helper object's methods and classify each by what its body does
 */
function readHelperMethods(script: string, helperName: string): Map<string, OperationKind> | null {
  const helperPattern = new RegExp(`var ${escapeRegExp(helperName)}=\\{([\\s\\S]*?)\\};`);
  const helper = script.match(helperPattern);
  if (!helper) return null;

  const methods = new Map<string, OperationKind>();
  for (const method of helper[1].matchAll(HELPER_METHOD_PATTERN)) {
    const kind = classifyMethod(method[3]);
    if (kind) {
      methods.set(method[1], kind);
    }
  }
  return methods.size > 0 ? methods : null;
}

export function deriveOperations(script: string): CipherOperation[] | null {
  let body: string | null = null;
  for (const pattern of DESCRAMBLE_FUNCTION_PATTERNS) {
    const match = script.match(pattern);
    if (match) {
      body = match[2];
      break;
    }
  }
  if (body === null) return null;

  const helperName = body.match(HELPER_NAME_PATTERN)?.[1];
  if (!helperName) return null;

  const methods = readHelperMethods(script, helperName);
  if (!methods) return null;

  const callPattern = new RegExp(`${escapeRegExp(helperName)}\\.([a-zA-Z0-9$]+)\\(a(?:,(\\d+))?\\)`, 'g');
  const operations: CipherOperation[] = [];

  for (const call of body.matchAll(callPattern)) {
    const kind = methods.get(call[1]);
    if (!kind) return null;

    const n = call[2] === undefined ? 0 : parseInt(call[2], 10);
    operations.push(kind === 'reverse' ? { op: 'reverse' } : { op: kind, n });
  }

  return operations.length > 0 ? operations : null;
}
