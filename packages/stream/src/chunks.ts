import { isRecord } from "@fnbridge/core";

/**
 * True for chunks that carry no content: null, undefined, the empty string,
 * or a record whose `contentKey` field is one of those. Records without the
 * field are not empty.
 */
export function isEmptyChunk(chunk: unknown, contentKey = "content"): boolean {
  if (chunk === null || chunk === undefined || chunk === "") return true;
  if (!isRecord(chunk) || !(contentKey in chunk)) return false;
  const content = chunk[contentKey];
  return content === null || content === undefined || content === "";
}
