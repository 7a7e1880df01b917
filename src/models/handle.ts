import { inspect } from "node:util";
import { Writer } from "../bplist/writer";
import { getLogger, isCleanDebug } from "../config";
import { BoundsError } from "../errors/bounds-error";
import { formatNode } from "../format";
import { JsonWriter } from "../json/writer";
import { OpenStepWriter } from "../openstep/writer";
import { XmlWriter } from "../xml/writer";
import { Lease } from "./lease";
import { Node, ValueKind, nodesEqual } from "./node";
import { PlainValue, nodeToPlain } from "./plain";

/**
 * @internal
 * Constructor payload shared by every handle class; never built outside the library.
 */
export class HandleInit<N extends Node = Node> {
  constructor(
    readonly lease: Lease,
    readonly node: N,
    /** whether inserting the handle somewhere moves it (true) or copies it (false) */
    readonly owned: boolean,
  ) { }
}

/**
 * Common base of {@link Value}, {@link Item}, {@link PlistArray} and {@link PlistDictionary}.
 *
 * A handle pairs a node with the lease that says whether the node may still be reached.
 * Every public accessor goes through {@link Handle._resolve}, so a handle whose lease has
 * died throws a {@link BoundsError} instead of showing outdated data.
 */
export abstract class Handle<N extends Node = Node> {
  /** @internal */
  readonly _lease: Lease;
  /** @internal */
  readonly _node: N;
  /** @internal */
  readonly _owned: boolean;

  protected constructor(init: HandleInit<N>) {
    this._lease = init.lease;
    this._node = init.node;
    this._owned = init.owned;
  }

  /**
   * @internal
   * @throws BoundsError when the handle was moved or its container changed shape
   */
  _resolve(): N {
    this._lease.check();
    return this._node;
  }

  get kind(): ValueKind {
    return this._resolve().kind;
  }

  /** false once the handle was moved, consumed, or its container was mutated */
  get isValid() {
    return this._lease.isValid;
  }

  /**
   * Same kind and recursively equal contents. Reals compare like `Object.is`;
   * dictionary key order is ignored.
   */
  equals(other: Handle): boolean {
    return nodesEqual(this._resolve(), other._resolve());
  }

  toXml(): string {
    return XmlWriter.encode(this._resolve(), getLogger());
  }

  toBinary(): Uint8Array {
    return Writer.encode(this._resolve(), getLogger());
  }

  toJson(prettify = true): string {
    return JsonWriter.encode(this._resolve(), getLogger(), { prettify });
  }

  toOpenStep(prettify = true): string {
    return OpenStepWriter.encode(this._resolve(), getLogger(), { prettify });
  }

  toPlain(): PlainValue {
    return nodeToPlain(this._resolve());
  }

  toString(): string {
    return formatNode(this._resolve(), isCleanDebug());
  }

  [inspect.custom]() {
    try {
      return `${this.constructor.name} ${this.toString()}`;
    }
    catch (err) {
      if (err instanceof BoundsError) {
        return `${this.constructor.name} <${err.reason}>`;
      }
      throw err;
    }
  }
}
