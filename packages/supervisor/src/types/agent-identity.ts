/**
 * Agent Identity
 *
 * Every actor address in the fleet is parsed exactly once into a tagged
 * variant. Downstream code switches on `kind` and never re-parses the raw
 * string.
 *
 * Address grammar:
 *
 *   mayor | mayor/ | deacon | deacon/ | narrator | narrator/   town level
 *   <ws>/witness | <ws>/refinery | <ws>/narrator                workspace roles
 *   <ws>/<name> | <ws>/workers/<name> | <ws>/polecats/<name>    worker
 *   <ws>/crew/<name>                                            human
 */

import { invalidAddress } from '@outpost/core';

// ============================================================================
// Types
// ============================================================================

/**
 * Roles that exist once per fleet
 */
export type TownRole = 'mayor' | 'deacon';

/**
 * Parsed actor address
 */
export type AgentIdentity =
  | { readonly kind: 'mayor' }
  | { readonly kind: 'deacon' }
  | { readonly kind: 'narrator'; readonly workspace?: string }
  | { readonly kind: 'witness'; readonly workspace: string }
  | { readonly kind: 'refinery'; readonly workspace: string }
  | { readonly kind: 'worker'; readonly workspace: string; readonly name: string }
  | { readonly kind: 'human'; readonly workspace: string; readonly name: string };

export type AgentKind = AgentIdentity['kind'];

/**
 * All identity kinds
 */
export const AGENT_KINDS: readonly AgentKind[] = [
  'mayor',
  'deacon',
  'narrator',
  'witness',
  'refinery',
  'worker',
  'human',
];

const SEGMENT_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/** Second-level segments that name a role rather than a worker */
const RESERVED_SEGMENTS = new Set(['witness', 'refinery', 'narrator', 'crew', 'workers', 'polecats']);

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parses an address into an identity, or undefined when it is outside the
 * grammar. Leading and trailing whitespace is ignored.
 */
export function parseAgentAddress(raw: string): AgentIdentity | undefined {
  const address = raw.trim();
  if (address === '') {
    return undefined;
  }

  // Town-level roles may carry one trailing slash
  const bare = address.endsWith('/') ? address.slice(0, -1) : address;
  if (!bare.includes('/')) {
    switch (bare) {
      case 'mayor':
        return { kind: 'mayor' };
      case 'deacon':
        return { kind: 'deacon' };
      case 'narrator':
        return { kind: 'narrator' };
      default:
        return undefined;
    }
  }

  const segments = address.split('/');
  if (!segments.every(segment => SEGMENT_PATTERN.test(segment))) {
    return undefined;
  }
  const [workspace, second, third] = segments;

  if (segments.length === 2) {
    switch (second) {
      case 'witness':
        return { kind: 'witness', workspace };
      case 'refinery':
        return { kind: 'refinery', workspace };
      case 'narrator':
        return { kind: 'narrator', workspace };
      default:
        return RESERVED_SEGMENTS.has(second) ? undefined : { kind: 'worker', workspace, name: second };
    }
  }

  if (segments.length === 3) {
    switch (second) {
      case 'crew':
        return { kind: 'human', workspace, name: third };
      case 'workers':
      case 'polecats':
        return { kind: 'worker', workspace, name: third };
      default:
        return undefined;
    }
  }

  return undefined;
}

/**
 * Parses an address, throwing when it is outside the grammar
 *
 * @throws ValidationError with code INVALID_ADDRESS
 */
export function requireAgentAddress(raw: string): AgentIdentity {
  const identity = parseAgentAddress(raw);
  if (!identity) {
    throw invalidAddress(raw);
  }
  return identity;
}

// ============================================================================
// Rendering
// ============================================================================

/**
 * Renders the canonical address for an identity
 *
 * @example
 * formatIdentity({ kind: 'mayor' })                                 // 'mayor/'
 * formatIdentity({ kind: 'worker', workspace: 'gastown', name: 'toast' }) // 'gastown/toast'
 */
export function formatIdentity(identity: AgentIdentity): string {
  switch (identity.kind) {
    case 'mayor':
    case 'deacon':
      return `${identity.kind}/`;
    case 'narrator':
      return identity.workspace ? `${identity.workspace}/narrator` : 'narrator/';
    case 'witness':
    case 'refinery':
      return `${identity.workspace}/${identity.kind}`;
    case 'worker':
      return `${identity.workspace}/${identity.name}`;
    case 'human':
      return `${identity.workspace}/crew/${identity.name}`;
  }
}

/**
 * Computes the terminal session id for an identity
 *
 * @example
 * sessionIdFor({ kind: 'mayor' }, 'gt-')                                 // 'gt-mayor'
 * sessionIdFor({ kind: 'worker', workspace: 'gastown', name: 'toast' }, 'gt-') // 'gt-gastown-toast'
 * sessionIdFor({ kind: 'human', workspace: 'gastown', name: 'joe' }, 'gt-')    // 'gt-gastown-crew-joe'
 */
export function sessionIdFor(identity: AgentIdentity, prefix: string): string {
  switch (identity.kind) {
    case 'mayor':
    case 'deacon':
      return `${prefix}${identity.kind}`;
    case 'narrator':
      return identity.workspace ? `${prefix}${identity.workspace}-narrator` : `${prefix}narrator`;
    case 'witness':
    case 'refinery':
      return `${prefix}${identity.workspace}-${identity.kind}`;
    case 'worker':
      return `${prefix}${identity.workspace}-${identity.name}`;
    case 'human':
      return `${prefix}${identity.workspace}-crew-${identity.name}`;
  }
}
