import { LeafNode } from "../../models/node";
import { Marker } from "../markers";
import { ObjRef } from "../types/bplist-index-aliases";

export class ObjectTableArrayLike {
  constructor(
    readonly type: Marker.array | Marker.set,
    readonly objrefs: readonly ObjRef[],
  ) { }
}

type DictKeyValue = readonly [key: ObjRef, value: ObjRef];
export class ObjectTableDict {
  constructor(
    readonly entries: readonly DictKeyValue[],
  ) { }
}

/** a decoded record: scalars are final, containers still hold references */
export type ObjectTableEntry = LeafNode | ObjectTableDict | ObjectTableArrayLike;
