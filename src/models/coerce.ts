import { BoundsError } from "../errors/bounds-error";
import { ConstructionError } from "../errors/construction-error";
import { PlistDate } from "./date";
import { Handle } from "./handle";
import { Lease, OwnerLease } from "./lease";
import { ArrayNode, DictionaryNode, Node, cloneNode, maxInteger, minInteger, newArrayNode, newDictionaryNode, nullNode } from "./node";
import { Uid } from "./uid";

/**
 * Anything that can become a plist node.
 *
 * Numbers that are safe integers become Integer; every other number (fractions, `-0`,
 * non-finite, beyond 2^53) becomes Real. Owning handles are moved, borrowed handles copied.
 */
export type ValueLike =
  | Handle
  | boolean
  | number
  | bigint
  | string
  | Uint8Array
  | ArrayBuffer
  | Date
  | PlistDate
  | Uid
  | null
  | readonly ValueLike[]
  | { readonly [key: string]: ValueLike };

export type DictionaryEntriesLike =
  | Iterable<readonly [string, ValueLike]>
  | { readonly [key: string]: ValueLike };

interface IBuildState {
  /** owned handles found so far; consumed only once the whole input converted */
  readonly owners: Set<OwnerLease>;
  /** plain arrays and objects on the current path */
  readonly ancestors: Set<object>;
  readonly destinationRoot?: Lease;
}

export function numberToNode(value: number): Node {
  if (Number.isSafeInteger(value) && !Object.is(value, -0)) {
    return { kind: 'integer', value: BigInt(value) };
  }
  return { kind: 'real', value };
}

export function bigintToNode(value: bigint): Node {
  if (value < minInteger || value > maxInteger) {
    throw new ConstructionError(`Integer ${value} is outside the range -2^63 to 2^64-1`, value);
  }
  return { kind: 'integer', value };
}

function isPlainObject(value: object): value is { readonly [key: string]: unknown } {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Converts `like` into a fresh node for insertion under `destinationRoot`.
 *
 * The input is fully converted before any owned handle is consumed, so a failure leaves
 * every handle it mentions usable.
 *
 * @throws ConstructionError for input with no plist counterpart
 * @throws BoundsError when a handle is stale, already moved, or would be inserted into itself
 */
export function nodeFromLike(like: ValueLike, destinationRoot?: Lease): Node {
  const state: IBuildState = { owners: new Set(), ancestors: new Set(), destinationRoot };
  const node = build(like, state);
  commit(state);
  return node;
}

export function arrayNodeFromLikes(items: Iterable<ValueLike>): ArrayNode {
  const state: IBuildState = { owners: new Set(), ancestors: new Set() };
  const target = newArrayNode();
  fill([{ kind: 'array', target, items: items[Symbol.iterator]() }], state);
  commit(state);
  return target;
}

export function dictionaryNodeFromLikes(entries: DictionaryEntriesLike): DictionaryNode {
  const state: IBuildState = { owners: new Set(), ancestors: new Set() };
  const target = newDictionaryNode();
  fill([{ kind: 'dictionary', target, entries: entriesOf(entries) }], state);
  commit(state);
  return target;
}

function commit(state: IBuildState) {
  for (const owner of state.owners) {
    owner.consume();
  }
}

/** a container node whose children are still being converted */
type Frame =
  | { readonly kind: 'array', readonly source?: object, readonly target: ArrayNode, readonly items: Iterator<unknown> }
  | { readonly kind: 'dictionary', readonly source?: object, readonly target: DictionaryNode, readonly entries: Iterator<readonly [string, unknown]> };

function build(like: unknown, state: IBuildState): Node {
  const stack: Frame[] = [];
  const node = open(like, state, stack);
  fill(stack, state);
  return node;
}

/** converts the children of every open container, depth first, with an explicit stack */
function fill(stack: Frame[], state: IBuildState) {
  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (frame.kind === 'array') {
      const next = frame.items.next();
      if (!next.done) {
        frame.target.items.push(open(next.value, state, stack));
        continue;
      }
    }
    else {
      const next = frame.entries.next();
      if (!next.done) {
        const [key, value] = next.value;
        frame.target.entries.set(key, open(value, state, stack));
        continue;
      }
    }

    stack.pop();
    if (frame.source) {
      state.ancestors.delete(frame.source);
    }
  }
}

/** converts a leaf, or returns an empty container and pushes a frame to fill it */
function open(like: unknown, state: IBuildState, stack: Frame[]): Node {
  if (like === null) {
    return nullNode;
  }

  switch (typeof like) {
    case 'boolean':
      return { kind: 'boolean', value: like };
    case 'number':
      return numberToNode(like);
    case 'bigint':
      return bigintToNode(like);
    case 'string':
      return { kind: 'string', value: like };
    case 'object':
      return openObject(like, state, stack);
    default:
      throw new ConstructionError(`Cannot convert a ${typeof like} into a plist value`, like);
  }
}

function openObject(like: object, state: IBuildState, stack: Frame[]): Node {
  if (like instanceof Handle) {
    return buildFromHandle(like, state);
  }
  if (like instanceof Uint8Array) {
    return { kind: 'data', value: like.slice() };
  }
  if (like instanceof ArrayBuffer) {
    return { kind: 'data', value: new Uint8Array(like.slice(0)) };
  }
  if (like instanceof Date) {
    return { kind: 'date', value: PlistDate.fromDate(like) };
  }
  if (like instanceof PlistDate) {
    return { kind: 'date', value: like };
  }
  if (like instanceof Uid) {
    return { kind: 'uid', value: like };
  }

  if (state.ancestors.has(like)) {
    throw new ConstructionError('Cannot convert a structure that contains itself', like);
  }

  if (Array.isArray(like)) {
    state.ancestors.add(like);
    const target = newArrayNode();
    stack.push({ kind: 'array', source: like, target, items: like[Symbol.iterator]() });
    return target;
  }
  if (isPlainObject(like)) {
    state.ancestors.add(like);
    const target = newDictionaryNode();
    stack.push({ kind: 'dictionary', source: like, target, entries: entriesOf(like) });
    return target;
  }

  throw new ConstructionError(`Cannot convert an instance of ${like.constructor.name} into a plist value`, like);
}

function* entriesOf(entries: unknown): Generator<readonly [string, unknown]> {
  if (typeof entries === 'object' && entries !== null && isIterable(entries)) {
    for (const entry of entries) {
      if (!Array.isArray(entry) || entry.length !== 2 || typeof entry[0] !== 'string') {
        throw new ConstructionError('Dictionary entries must be [key, value] pairs with a string key', entry);
      }
      yield [entry[0], entry[1]];
    }
    return;
  }

  if (typeof entries !== 'object' || entries === null || !isPlainObject(entries)) {
    throw new ConstructionError('Dictionary entries must be an iterable of pairs or a plain object', entries);
  }
  yield* Object.entries(entries);
}

function isIterable(value: object): value is Iterable<unknown> {
  return Symbol.iterator in value && typeof value[Symbol.iterator] === 'function';
}

function buildFromHandle(handle: Handle, state: IBuildState): Node {
  const node = handle._resolve();
  if (!handle._owned) {
    return cloneNode(node);
  }

  const owner = handle._lease.root;
  if (owner === state.destinationRoot) {
    throw new BoundsError('Cannot insert a tree into itself', 'self-insertion');
  }
  if (state.owners.has(owner)) {
    throw new ConstructionError('The same owning handle appears more than once', handle);
  }
  state.owners.add(owner);
  return node;
}
