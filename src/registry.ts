import { createHash } from 'node:crypto';
import { AnchorKind, AnchorTarget, ManifestEntry } from './types.js';
import { slugify } from './html.js';
import { IdCollisionExhaustedError, RegistryFrozenError } from './errors.js';

/**
 * Options that shape generated ids
 */
export interface RegistryOptions {
  idPrefix: string;
  maxIdLength: number;
  collisionSuffixLength: number;
  maxCollisionAttempts: number;
}

/**
 * Where a registered target lives and how it reads
 */
export interface TargetPlacement {
  title: string;
  plainText: string;
  file: string;
  position: number;
  level?: number;
  number?: string;
}

export interface FuzzyOptions {
  /** Targets in this file win over earlier targets elsewhere */
  preferFile?: string;
  /** Kinds eligible for matching (all kinds when absent) */
  kinds?: readonly AnchorKind[];
  /** Shortest string either side of a comparison may be */
  minLength?: number;
}

// Safe author ids are adopted verbatim
const SAFE_ID = /^[A-Za-z][A-Za-z0-9_-]*$/;

const KIND_SEGMENTS: Record<AnchorKind, string> = {
  heading: 'heading',
  figure: 'figure',
  table: 'table',
  bookmark: 'bookmark',
  footnote: 'footnote',
  endnote: 'endnote',
  indexterm: 'index'
};

export function isSafeId(id: string): boolean {
  return SAFE_ID.test(id);
}

/**
 * Pick the first candidate in `file`, else the first candidate overall
 */
export function preferFile<T extends { file: string }>(candidates: T[], file?: string): T | undefined {
  if (file !== undefined) {
    const local = candidates.find(c => c.file === file);
    if (local) return local;
  }
  return candidates[0];
}

/**
 * Append-only registry of collision-free ids.
 *
 * Open while scan results are merged (single writer, deterministic order),
 * then frozen and queried read-only by every later phase.
 */
export class AnchorRegistry {
  private readonly ids = new Set<string>();
  private readonly byId = new Map<string, AnchorTarget>();
  private readonly ordered: AnchorTarget[] = [];
  private readonly byOriginal = new Map<string, AnchorTarget[]>();
  private frozen = false;
  private collisions = 0;

  constructor(private readonly options: RegistryOptions) {}

  /**
   * Register a target and return its final id.
   * Throws IdCollisionExhaustedError when no free id is found within the attempt cap.
   */
  register(
    candidateId: string | undefined,
    kind: AnchorKind,
    contentForFallback: string,
    placement: TargetPlacement
  ): string {
    const id = this.allocate(candidateId, KIND_SEGMENTS[kind], contentForFallback);
    // Only ids that could have been adopted count as author ids
    const originalId = candidateId !== undefined && isSafeId(candidateId) ? candidateId : undefined;
    const target: AnchorTarget = {
      id,
      originalId,
      kind,
      title: placement.title,
      plainText: placement.plainText,
      file: placement.file,
      position: placement.position,
      level: placement.level ?? 0,
      number: placement.number
    };
    this.byId.set(id, target);
    this.ordered.push(target);
    if (originalId !== undefined) {
      const sameOriginal = this.byOriginal.get(originalId);
      if (sameOriginal) {
        sameOriginal.push(target);
      } else {
        this.byOriginal.set(originalId, [target]);
      }
    }
    return id;
  }

  /**
   * Reserve an id in the shared namespace without creating a target
   * (call sites, generated page anchors).
   */
  claim(candidateId: string | undefined, segment: string, contentForFallback: string): string {
    return this.allocate(candidateId, segment, contentForFallback);
  }

  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  get collisionsResolved(): number {
    return this.collisions;
  }

  has(id: string): boolean {
    return this.ids.has(id);
  }

  get(id: string): AnchorTarget | undefined {
    return this.byId.get(id);
  }

  /**
   * Targets whose author id was `originalId`, in registration order
   */
  byOriginalId(originalId: string): AnchorTarget[] {
    return this.byOriginal.get(originalId) ?? [];
  }

  byKind(kind: AnchorKind): AnchorTarget[] {
    return this.ordered.filter(t => t.kind === kind);
  }

  /**
   * All targets in registration order
   */
  targets(): readonly AnchorTarget[] {
    return this.ordered;
  }

  /**
   * Case-insensitive containment of a target's title or text in the key, or
   * of the key in the title or text.
   */
  findFuzzy(key: string, options: FuzzyOptions = {}): AnchorTarget | undefined {
    const needle = key.trim().toLowerCase();
    const minLength = options.minLength ?? 1;
    if (needle.length < minLength) return undefined;

    const matches = this.ordered.filter(target => {
      if (options.kinds && !options.kinds.includes(target.kind)) return false;
      return [target.title, target.plainText].some(text => {
        const hay = text.trim().toLowerCase();
        if (Math.min(hay.length, needle.length) < minLength) return false;
        return needle.includes(hay) || hay.includes(needle);
      });
    });
    return preferFile(matches, options.preferFile);
  }

  manifest(): Record<string, ManifestEntry> {
    const manifest: Record<string, ManifestEntry> = {};
    for (const target of this.ordered) {
      manifest[target.id] = {
        title: target.title,
        kind: target.kind,
        file: target.file,
        number: target.number ?? '',
        level: target.level
      };
    }
    return manifest;
  }

  targetMapping(): Record<string, string> {
    const mapping: Record<string, string> = {};
    for (const target of this.ordered) {
      mapping[target.id] = target.file;
    }
    return mapping;
  }

  private deriveBase(segment: string, content: string): string {
    const { idPrefix, maxIdLength, collisionSuffixLength } = this.options;
    // Leave room for "-" plus the suffix
    const budget = maxIdLength - collisionSuffixLength - 1;
    const slug = slugify(content);
    const base = slug ? `${idPrefix}-${segment}-${slug}` : `${idPrefix}-${segment}`;
    return base.slice(0, budget).replace(/-+$/, '');
  }

  private suffix(base: string, attempt: number): string {
    return createHash('md5')
      .update(`${base}-${attempt}`)
      .digest('hex')
      .slice(0, this.options.collisionSuffixLength);
  }

  private allocate(candidateId: string | undefined, segment: string, content: string): string {
    if (this.frozen) {
      throw new RegistryFrozenError(`Cannot register "${candidateId ?? content}": registry is frozen`);
    }

    const base = candidateId !== undefined && isSafeId(candidateId)
      ? candidateId
      : this.deriveBase(segment, content);

    let finalId = base;
    let attempt = 1;
    while (this.ids.has(finalId)) {
      if (attempt > this.options.maxCollisionAttempts) {
        throw new IdCollisionExhaustedError(
          `No free id for "${base}" after ${this.options.maxCollisionAttempts} attempts`,
          base,
          this.options.maxCollisionAttempts
        );
      }
      finalId = `${base}-${this.suffix(base, attempt)}`;
      attempt++;
    }

    if (finalId !== base) {
      this.collisions++;
    }
    this.ids.add(finalId);
    return finalId;
  }
}
