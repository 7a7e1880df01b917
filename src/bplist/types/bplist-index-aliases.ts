/** index into the offset table, as stored in container records and the trailer */
export type ObjRef = number & {};
/** absolute byte offset of an object record in the file */
export type ObjectTableOffset = number & {};
