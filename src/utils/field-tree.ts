import type { FieldSpec, FieldTree } from "../schemas/field-spec";

function typeLabel(field: FieldSpec): string {
  switch (field.type.kind) {
    case "object":
      return "";
    case "enum":
      return " <enum>";
    case "primitive":
      return field.type.maxLength !== undefined
        ? ` <${field.type.primitive}(${field.type.maxLength})>`
        : ` <${field.type.primitive}>`;
  }
}

/**
 * Render a message layout, one field per line, `|  ` per nesting level:
 *
 *   phone (required):
 *   |  name <string(128)> (required)
 *   |  @uuid <string>
 *   |  lines[]:
 *   |  <choice> name | uuid
 */
export function formatFieldTree(tree: FieldTree): string[] {
  const lines: string[] = [];

  const walk = (node: FieldSpec, depth: number): void => {
    const indent = "|  ".repeat(depth);
    for (const field of node.children) {
      const nested = field.children.some((c) => !c.attribute) || field.choices.length > 0;
      lines.push(
        `${indent}${field.attribute ? "@" : ""}${field.name}${field.repeated ? "[]" : ""}` +
          `${typeLabel(field)}${field.required ? " (required)" : ""}${nested ? ":" : ""}`
      );
      walk(field, depth + 1);
    }
    for (const group of node.choices) {
      const branches = group.branches.map((b) => b.join(" + ")).join(" | ");
      lines.push(`${indent}<choice${group.required ? "" : ", optional"}> ${branches}`);
    }
  };

  walk(tree.root, 0);
  return lines;
}
