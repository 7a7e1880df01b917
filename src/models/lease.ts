import { BoundsError } from "../errors/bounds-error";
import { ContainerNode } from "./node";

/**
 * Runtime stand-in for a borrow checker.
 *
 * Every handle holds a lease. An {@link OwnerLease} belongs to a root handle and dies when the
 * root is moved or consumed. A {@link BorrowLease} is issued by a container for one of its children
 * and dies when its parent lease dies or when the container's generation moves on.
 */
export abstract class Lease {
  /** @throws BoundsError when the lease is no longer valid */
  abstract check(): void;

  abstract get root(): OwnerLease;

  get isValid() {
    try {
      this.check();
      return true;
    }
    catch (err) {
      if (err instanceof BoundsError) {
        return false;
      }
      throw err;
    }
  }
}

export class OwnerLease extends Lease {
  private _consumed = false;

  check() {
    if (this._consumed) {
      throw new BoundsError('Handle was moved or consumed and can no longer be used', 'moved');
    }
  }

  consume() {
    this.check();
    this._consumed = true;
  }

  get root() {
    return this;
  }
}

export class BorrowLease extends Lease {
  constructor(
    readonly parent: Lease,
    readonly container: ContainerNode,
    readonly generation: number,
  ) {
    super();
  }

  static issue(parent: Lease, container: ContainerNode) {
    return new BorrowLease(parent, container, container.generation);
  }

  check() {
    this.parent.check();
    if (this.container.generation !== this.generation) {
      throw new BoundsError(`Borrowed handle is stale: its ${this.container.kind} was modified after the handle was issued`, 'stale-handle');
    }
  }

  get root(): OwnerLease {
    return this.parent.root;
  }
}
