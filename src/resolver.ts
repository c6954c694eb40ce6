import { AnchorKind, AnchorTarget, ReferenceCall } from './types.js';
import { AnchorRegistry, preferFile } from './registry.js';

/**
 * Outcome of resolving one reference call
 */
export type Resolution =
  | { status: 'resolved'; target: AnchorTarget; href: string; matchedBy: 'id' | 'original-id' | 'title' }
  | { status: 'broken' };

export interface ResolveOptions {
  /** Shortest key or title the fuzzy match will compare */
  minFuzzyMatchLength: number;
}

export interface ResolveSummary {
  resolved: number;
  broken: ReferenceCall[];
}

// Notes and index terms are reachable by id only, never by title
const FUZZY_KINDS: readonly AnchorKind[] = ['heading', 'figure', 'table', 'bookmark'];

/**
 * Same-file links are bare fragments; anything else carries the file name
 */
export function hrefFor(targetFile: string, targetId: string, fromFile: string): string {
  return targetFile === fromFile ? `#${targetId}` : `${targetFile}#${targetId}`;
}

/**
 * Resolve a call against the frozen registry. First match wins:
 * final id, then author id, then fuzzy title containment.
 * Does not touch the call or the registry.
 */
export function resolveReference(
  call: ReferenceCall,
  registry: AnchorRegistry,
  options: ResolveOptions
): Resolution {
  const fromFile = call.effectiveFile;
  const link = (target: AnchorTarget, matchedBy: 'id' | 'original-id' | 'title'): Resolution => ({
    status: 'resolved',
    target,
    href: hrefFor(target.file, target.id, fromFile),
    matchedBy
  });

  const exact = registry.get(call.targetKey);
  if (exact) return link(exact, 'id');

  const byAuthorId = preferFile(registry.byOriginalId(call.targetKey), fromFile);
  if (byAuthorId) return link(byAuthorId, 'original-id');

  for (const key of [call.targetKey, call.displayText]) {
    const fuzzy = registry.findFuzzy(key, {
      preferFile: fromFile,
      kinds: FUZZY_KINDS,
      minLength: options.minFuzzyMatchLength
    });
    if (fuzzy) return link(fuzzy, 'title');
  }

  return { status: 'broken' };
}

/**
 * Resolve every call, writing `resolvedHref`, `targetId` and `broken` on each.
 */
export function resolveReferences(
  calls: ReferenceCall[],
  registry: AnchorRegistry,
  options: ResolveOptions
): ResolveSummary {
  const broken: ReferenceCall[] = [];
  let resolved = 0;

  for (const call of calls) {
    const resolution = resolveReference(call, registry, options);
    if (resolution.status === 'resolved') {
      call.resolvedHref = resolution.href;
      call.targetId = resolution.target.id;
      call.broken = false;
      resolved++;
    } else {
      call.broken = true;
      broken.push(call);
    }
  }

  return { resolved, broken };
}
