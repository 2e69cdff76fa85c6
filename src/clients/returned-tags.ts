/**
 * AXL `returnedTags` — get/list operations only return the tags named in
 * the request's `returnedTags` element. This builds that element from the
 * operation schema: every declared tag when none are asked for, otherwise
 * only the asked-for tags, each expanded to its full sub-tree.
 */

import type { FieldSpec, OperationSchema, RequestPayload, RequestValue } from "../schemas/field-spec";
import { UnexpectedFieldError } from "../utils/errors";

export const RETURNED_TAGS = "returnedTags";

function emptyTag(field: FieldSpec): RequestValue {
  const elements = field.children.filter((c) => !c.attribute);
  if (field.type.kind !== "object" || elements.length === 0) return "";
  const out: RequestPayload = {};
  for (const child of elements) out[child.name] = emptyTag(child);
  return out;
}

/** Tag names an operation accepts, in schema order. */
export function returnedTagNames(schema: OperationSchema): string[] {
  const field = schema.request.get(RETURNED_TAGS);
  return field ? field.children.filter((c) => !c.attribute).map((c) => c.name) : [];
}

/**
 * The `returnedTags` value for a request, or undefined when the operation
 * has no such element and no tags were asked for.
 */
export function buildReturnedTags(
  schema: OperationSchema,
  tags: readonly string[] = []
): RequestPayload | undefined {
  const field = schema.request.get(RETURNED_TAGS);
  if (!field) {
    if (tags.length > 0) throw new UnexpectedFieldError(schema.name, RETURNED_TAGS, RETURNED_TAGS);
    return undefined;
  }

  const elements = field.children.filter((c) => !c.attribute);
  const wanted = tags.length > 0 ? tags : elements.map((c) => c.name);
  const out: RequestPayload = {};
  for (const tag of wanted) {
    const child = elements.find((c) => c.name === tag);
    if (!child) throw new UnexpectedFieldError(schema.name, `${RETURNED_TAGS}.${tag}`, tag);
    out[tag] = emptyTag(child);
  }
  return out;
}
