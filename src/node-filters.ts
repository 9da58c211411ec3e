/**
 * Node filters select which files of a product package get downloaded
 */
import { minimatch } from "minimatch";

import type { NodeInfo } from "./utils.js";

export interface NodeFilter {
  accepts(node: NodeInfo): boolean;
  describe(): string;
}

/**
 * Accepts every node; downloads a product as a directory instead of a single archive
 */
export class AllNodesFilter implements NodeFilter {
  accepts(_node: NodeInfo): boolean {
    return true;
  }

  describe(): string {
    return "all nodes";
  }
}

/**
 * Accepts nodes whose size does not exceed `maxSize` bytes
 */
export class SizeFilter implements NodeFilter {
  constructor(readonly maxSize: number) {}

  accepts(node: NodeInfo): boolean {
    return node.size <= this.maxSize;
  }

  describe(): string {
    return `size <= ${this.maxSize} bytes`;
  }
}

// Stands in for "/" so that minimatch sees one segment and `*` and `?` cross directories
const SEPARATOR = "\u001f";

function asSingleSegment(value: string): string {
  return value.split("/").join(SEPARATOR);
}

/**
 * Matches the lower-cased node path (without a leading "./") against a shell-style
 * pattern. As with fnmatch, `*` and `?` also match "/", so "*.xml" selects XML files
 * in any directory.
 */
export class PathFilter implements NodeFilter {
  readonly pattern: string;
  readonly exclude: boolean;

  constructor(pattern: string, options: { exclude?: boolean } = {}) {
    this.pattern = pattern;
    this.exclude = options.exclude ?? false;
  }

  accepts(node: NodeInfo): boolean {
    const nodePath = asSingleSegment(normalizeNodePath(node.nodePath).toLowerCase());
    const matched = minimatch(nodePath, asSingleSegment(this.pattern), {
      dot: true,
      nocase: true,
      nobrace: true,
      noext: true,
    });
    return this.exclude ? !matched : matched;
  }

  describe(): string {
    return `${this.exclude ? "not " : ""}matching ${this.pattern}`;
  }
}

export class AndFilter implements NodeFilter {
  readonly filters: readonly NodeFilter[];

  constructor(...filters: NodeFilter[]) {
    this.filters = filters;
  }

  accepts(node: NodeInfo): boolean {
    return this.filters.every((filter) => filter.accepts(node));
  }

  describe(): string {
    return this.filters.map((filter) => `(${filter.describe()})`).join(" and ") || "all nodes";
  }
}

export class OrFilter implements NodeFilter {
  readonly filters: readonly NodeFilter[];

  constructor(...filters: NodeFilter[]) {
    this.filters = filters;
  }

  accepts(node: NodeInfo): boolean {
    return this.filters.some((filter) => filter.accepts(node));
  }

  describe(): string {
    return this.filters.map((filter) => `(${filter.describe()})`).join(" or ") || "no nodes";
  }
}

export class NotFilter implements NodeFilter {
  constructor(readonly inner: NodeFilter) {}

  accepts(node: NodeInfo): boolean {
    return !this.inner.accepts(node);
  }

  describe(): string {
    return `not (${this.inner.describe()})`;
  }
}

export function normalizeNodePath(nodePath: string): string {
  return nodePath.startsWith("./") ? nodePath.slice(2) : nodePath;
}

export interface NodeFilterOptions {
  include?: string[];
  exclude?: string[];
  maxSize?: number;
}

/**
 * Build a filter from plain options: any include pattern, no exclude pattern, within size
 */
export function buildNodeFilter(options: NodeFilterOptions): NodeFilter {
  const parts: NodeFilter[] = [];
  if (options.include?.length) {
    parts.push(new OrFilter(...options.include.map((pattern) => new PathFilter(pattern))));
  }
  for (const pattern of options.exclude ?? []) {
    parts.push(new PathFilter(pattern, { exclude: true }));
  }
  if (options.maxSize !== undefined) {
    parts.push(new SizeFilter(options.maxSize));
  }
  if (parts.length === 0) {
    return new AllNodesFilter();
  }
  return parts.length === 1 ? parts[0] : new AndFilter(...parts);
}
