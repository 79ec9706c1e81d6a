import {SubgridError} from './grid-errors.js';

import type {NodeId, GridAxis, LineNames} from './grid-types.js';

/**
 * Line span in the parent, as line indices: [start, end)
 */
export interface LineSpan {
  start: number;
  end: number;
}

export interface LineNameInheritanceLevel {
  subgridId: NodeId;
  /**
   * Only read for the outermost level of a chain. The others inherit what the
   * level above them resolved to.
   */
  parentLineNames: LineNames;
  /**
   * The subgrid's own `subgrid [a] [b]` line name lists, one list per line
   * starting at its first line
   */
  declaredNames: LineNames;
  spanInParent: LineSpan;
}

const RESERVED_IDENTIFIERS = new Set(['auto', 'inherit', 'initial', 'unset', 'none']);

function isNameStart(c: string) {
  return c >= 'a' && c <= 'z' || c >= 'A' && c <= 'Z' || c === '_' || c > '\x7f';
}

function isNameChar(c: string) {
  return isNameStart(c) || c >= '0' && c <= '9' || c === '-';
}

/**
 * Checks `name` against the (simplified) CSS <custom-ident> grammar. Returns
 * the reason it's invalid, or null if it's valid.
 */
export function validateCssIdentifier(name: string): string | null {
  if (!name) return 'Invalid CSS identifier: must not be empty';

  const chars = Array.from(name);

  if (!isNameStart(chars[0]) || !chars.slice(1).every(isNameChar)) {
    return 'Invalid CSS identifier: must start with letter/underscore and ' +
      'contain only alphanumeric/hyphen/underscore';
  }

  if (RESERVED_IDENTIFIERS.has(name.toLowerCase())) {
    return `Invalid CSS identifier: "${name}" is a reserved keyword`;
  }

  return null;
}

/**
 * Works out which line names a subgrid sees: the names of the parent's lines
 * it spans plus its own declared names. Results are memoized per subgrid, axis
 * and parent names.
 */
export class LineNameInheritanceMapper {
  private cache: Map<string, LineNames>;
  public hits: number;
  public misses: number;

  constructor() {
    this.cache = new Map();
    this.hits = 0;
    this.misses = 0;
  }

  extractParentNamesForSpan(parentNames: LineNames, start: number, end: number): LineNames {
    if (start >= parentNames.length || end > parentNames.length) {
      throw SubgridError.invalidLineNameSpan(start, end, parentNames.length);
    }

    if (start >= end) {
      throw SubgridError.lineMappingFailed(
        `span start ${start}`,
        `span end ${end}`,
        'Invalid span: start must be less than end'
      );
    }

    return parentNames.slice(start, end).map(names => names.slice());
  }

  mergeWithDeclaredNames(inherited: LineNames, declared: LineNames): LineNames {
    // declared lists past the last line are ignored
    return inherited.map((names, i) => {
      const merged = names.slice();
      for (const name of declared[i] ?? []) {
        if (name && !merged.includes(name)) merged.push(name);
      }
      return merged;
    });
  }

  validateLineNames(lineNames: LineNames) {
    for (let i = 0; i < lineNames.length; i++) {
      for (const name of lineNames[i]) {
        const reason = validateCssIdentifier(name);
        if (reason) throw SubgridError.invalidCssIdentifier(name, i, reason);
      }
    }
  }

  mapSubgridLineNames(
    parentNames: LineNames,
    declared: LineNames,
    span: LineSpan,
    subgridId: NodeId,
    axis: GridAxis
  ): LineNames {
    const key = `${subgridId}:${axis}:${span.start}-${span.end}:` +
      JSON.stringify(parentNames) + JSON.stringify(declared);
    const cached = this.cache.get(key);

    if (cached) {
      this.hits += 1;
      return cached.map(names => names.slice());
    }

    this.misses += 1;

    const inherited = this.extractParentNamesForSpan(parentNames, span.start, span.end);
    const merged = this.mergeWithDeclaredNames(inherited, declared);
    this.validateLineNames(merged);

    this.cache.set(key, merged);
    return merged.map(names => names.slice());
  }

  /**
   * Resolves the line names of the innermost subgrid in a chain of subgrids
   * nested inside each other, outermost first. Each level applies its span and
   * declared names to what the level above it resolved to.
   */
  resolveNestedSubgridLineNames(chain: LineNameInheritanceLevel[], axis: GridAxis): LineNames {
    if (!chain.length) return [];

    let current = chain[0].parentLineNames;

    for (const level of chain) {
      current = this.mapSubgridLineNames(
        current,
        level.declaredNames,
        level.spanInParent,
        level.subgridId,
        axis
      );
    }

    return current;
  }

  clear() {
    this.cache.clear();
  }
}
