import type { SchemaNode } from "../../domain/book/edition";

/**
 * Schema titles arranged as a tree of structural identifiers. A node is
 * reachable under each of its identifiers (`key`, `enTitle`, `title`).
 */
export type TitleLookup = {
  title?: string;
  children: Map<string, TitleLookup>;
};

export type TitleSource = "schema" | "inline" | "placeholder";

export type ResolvedTitle = {
  title: string;
  source: TitleSource;
};

function identifiers(node: SchemaNode): string[] {
  const ids = [node.key, node.enTitle, node.title].filter(
    (id): id is string => typeof id === "string" && id.length > 0,
  );
  return [...new Set(ids)];
}

function displayTitle(node: SchemaNode): string | undefined {
  const title = node.heTitle?.trim() || node.title?.trim();
  return title && title.length > 0 ? title : undefined;
}

export function buildTitleLookup(nodes: SchemaNode[]): TitleLookup {
  const root: TitleLookup = { children: new Map() };
  const visit = (parent: TitleLookup, list: SchemaNode[]) => {
    for (const node of list) {
      const entry: TitleLookup = { title: displayTitle(node), children: new Map() };
      for (const id of identifiers(node)) {
        // first definition wins
        if (!parent.children.has(id)) parent.children.set(id, entry);
      }
      if (node.nodes) visit(entry, node.nodes);
    }
  };
  visit(root, nodes);
  return root;
}

/** Fills `{n}` in a placeholder template. */
export function placeholderTitle(template: string, n: number): string {
  return template.replace(/\{n\}/g, String(n));
}

/**
 * Title for the node at `path` (structural keys from the chapter down):
 * the schema title if the schema has one, else the node's own non-empty
 * label, else `placeholder`.
 */
export function resolveTitle(
  path: string[],
  lookup: TitleLookup,
  placeholder: string,
): ResolvedTitle {
  let node: TitleLookup | undefined = lookup;
  for (const key of path) {
    node = node.children.get(key);
    if (!node) break;
  }
  if (node && node !== lookup && node.title) {
    return { title: node.title, source: "schema" };
  }
  const inline = path[path.length - 1]?.trim();
  if (inline) return { title: inline, source: "inline" };
  return { title: placeholder, source: "placeholder" };
}
