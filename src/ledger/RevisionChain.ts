/**
 * RevisionChain - The linear revision graph and pure path resolution
 */

import { ChainError, NotAncestorError, UnknownRevisionError } from './errors.js';
import { BASE, Direction, HEAD } from './types.js';
import type { Revision } from './types.js';

export class RevisionChain {
  private revisions: Revision[] = [];
  private positions = new Map<string, number>();

  /**
   * Build a chain from an unordered set of revisions, ordering by parent links.
   * Throws ChainError before anything runs if the set is not a single linked list.
   */
  static fromRevisions(revisions: Revision[]): RevisionChain {
    const byId = new Map<string, Revision>();
    for (const revision of revisions) {
      if (byId.has(revision.id)) {
        throw new ChainError('DUPLICATE_REVISION', `Duplicate revision id '${revision.id}'`);
      }
      byId.set(revision.id, revision);
    }

    const roots = revisions.filter(r => r.parentId === null);
    if (roots.length === 0 && revisions.length > 0) {
      throw new ChainError('CHAIN_BROKEN', 'No root revision (every revision has a parent)');
    }
    if (roots.length > 1) {
      throw new ChainError(
        'CHAIN_BROKEN',
        `Multiple root revisions: ${roots.map(r => r.id).join(', ')}`
      );
    }

    const children = new Map<string, Revision>();
    for (const revision of revisions) {
      if (revision.parentId === null) continue;
      if (!byId.has(revision.parentId)) {
        throw new ChainError(
          'BROKEN_LINK',
          `Revision '${revision.id}' follows unknown revision '${revision.parentId}'`
        );
      }
      const sibling = children.get(revision.parentId);
      if (sibling) {
        throw new ChainError(
          'CHAIN_BROKEN',
          `Revisions '${sibling.id}' and '${revision.id}' both follow '${revision.parentId}'`
        );
      }
      children.set(revision.parentId, revision);
    }

    const chain = new RevisionChain();
    let next: Revision | undefined = roots[0];
    while (next) {
      chain.register(next);
      next = children.get(next.id);
    }

    if (chain.length !== revisions.length) {
      const orphaned = revisions.filter(r => !chain.has(r.id)).map(r => r.id);
      throw new ChainError(
        'CHAIN_BROKEN',
        `Revisions not reachable from the root (cycle): ${orphaned.join(', ')}`
      );
    }

    return chain;
  }

  /**
   * Append a revision to the tail of the chain
   */
  register(revision: Revision): this {
    if (this.positions.has(revision.id)) {
      throw new ChainError('DUPLICATE_REVISION', `Duplicate revision id '${revision.id}'`);
    }

    const expectedParent = this.tip?.id ?? null;
    if (revision.parentId !== expectedParent) {
      throw new ChainError(
        'BROKEN_LINK',
        `Revision '${revision.id}' follows '${revision.parentId ?? BASE}', but the chain ends at '${expectedParent ?? BASE}'`
      );
    }

    this.positions.set(revision.id, this.revisions.length);
    this.revisions.push(revision);
    return this;
  }

  get length(): number {
    return this.revisions.length;
  }

  get root(): Revision | null {
    return this.revisions[0] ?? null;
  }

  get tip(): Revision | null {
    return this.revisions[this.revisions.length - 1] ?? null;
  }

  has(id: string): boolean {
    return this.positions.has(id);
  }

  get(id: string): Revision {
    return this.revisions[this.position(id)];
  }

  /**
   * Revisions in chain order, root first
   */
  list(): Revision[] {
    return [...this.revisions];
  }

  /**
   * Resolve a target ('head', 'base' or a revision id) to a revision id, null meaning base
   */
  resolve(target: string): string | null {
    if (target === BASE) return null;
    if (target === HEAD) return this.tip?.id ?? null;
    if (!this.positions.has(target)) {
      throw new UnknownRevisionError(target);
    }
    return target;
  }

  /**
   * Chain index of a revision; base sits at -1
   */
  position(id: string | null): number {
    if (id === null) return -1;
    const index = this.positions.get(id);
    if (index === undefined) {
      throw new UnknownRevisionError(id);
    }
    return index;
  }

  /**
   * Revisions after `from` up to and including `to`, in chain order
   */
  forwardPath(from: string | null, to: string | null): Revision[] {
    const start = this.position(from);
    const end = this.position(to);
    if (end < start) {
      throw new NotAncestorError(from, to, Direction.Up);
    }
    return this.revisions.slice(start + 1, end + 1);
  }

  /**
   * Revisions from `from` back to, but excluding, `to`, in reverse chain order
   */
  backwardPath(from: string | null, to: string | null): Revision[] {
    const start = this.position(from);
    const end = this.position(to);
    if (end > start) {
      throw new NotAncestorError(from, to, Direction.Down);
    }
    return this.revisions.slice(end + 1, start + 1).reverse();
  }
}
