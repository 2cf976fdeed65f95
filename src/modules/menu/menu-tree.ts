import { readFile } from "fs/promises";
import * as path from "path";
import { ConfigurationError, describeError } from "../../common/errors/ussd.errors";
import { menuTreeSchema } from "./menu-tree.schema";
import {
  BACK_INPUT,
  MenuChoice,
  MenuMessages,
  MenuNodeDefinition,
  MenuNodeDefinitionUnion,
  MenuTreeDefinition,
  MenuTreeNode,
  NODE_TYPES,
  TERMINAL_EFFECTS,
} from "./types/menu.types";

export const MENU_TREE = Symbol("MENU_TREE");

/**
 * Read-only lookup of every screen. Built once at startup; a broken tree
 * throws ConfigurationError from the constructor so the process never serves it.
 */
export class MenuTree {
  private readonly nodes: ReadonlyMap<string, MenuTreeNode>;

  constructor(
    readonly root: string,
    nodes: MenuTreeNode[],
    readonly messages: Readonly<MenuMessages>,
  ) {
    const problems: string[] = [];
    const byId = new Map<string, MenuTreeNode>();

    for (const node of nodes) {
      if (byId.has(node.id)) {
        problems.push(`Duplicate node id: ${node.id}`);
      }
      byId.set(node.id, node);
    }

    const rootNode = byId.get(root);
    if (!rootNode) {
      problems.push(`Root node ${root} is not defined`);
    } else if (rootNode.type === NODE_TYPES.TERMINAL) {
      problems.push(`Root node ${root} cannot be terminal`);
    }

    for (const node of byId.values()) {
      problems.push(...MenuTree.checkNode(node, byId));
    }

    if (problems.length > 0) {
      throw new ConfigurationError(
        `Menu tree is invalid: ${problems.join("; ")}`,
        problems,
      );
    }

    for (const node of byId.values()) {
      deepFreeze(node);
    }
    this.nodes = byId;
    Object.freeze(this.messages);
  }

  private static checkNode(node: MenuTreeNode, byId: Map<string, MenuTreeNode>): string[] {
    const problems: string[] = [];
    const requireNode = (target: string, via: string) => {
      if (!byId.has(target)) {
        problems.push(`Node ${node.id} ${via} references missing node ${target}`);
      }
    };

    switch (node.type) {
      case NODE_TYPES.MENU: {
        const inputs = new Set<string>();
        for (const choice of node.choices) {
          if (inputs.has(choice.input)) {
            problems.push(`Node ${node.id} declares input ${choice.input} twice`);
          }
          inputs.add(choice.input);
          requireNode(choice.next, `choice ${choice.input}`);
        }
        if (node.back && inputs.has(BACK_INPUT)) {
          problems.push(`Node ${node.id} uses ${BACK_INPUT} as a choice and for back`);
        }
        break;
      }
      case NODE_TYPES.INPUT:
        requireNode(node.next, "next");
        if (node.validator.type === "pattern") {
          try {
            new RegExp(node.validator.pattern);
          } catch (error) {
            problems.push(`Node ${node.id} pattern does not compile: ${describeError(error)}`);
          }
        }
        break;
      case NODE_TYPES.LISTING_PAGE:
        requireNode(node.next, "next");
        break;
      case NODE_TYPES.TERMINAL:
        break;
    }

    return problems;
  }

  getNode(id: string): MenuTreeNode {
    const node = this.nodes.get(id);
    if (!node) {
      throw new ConfigurationError(`Unknown menu node: ${id}`);
    }
    return node;
  }

  has(id: string): boolean {
    return this.nodes.has(id);
  }

  nodeIds(): string[] {
    return [...this.nodes.keys()];
  }

  get size(): number {
    return this.nodes.size;
  }
}

function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === "object" && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

function expandMenuChoices(
  definition: MenuNodeDefinition,
  options: Record<string, string[]>,
  problems: string[],
): MenuChoice[] {
  if (definition.choices) {
    return definition.choices.map((choice) => ({ ...choice }));
  }

  const listName = definition.options ?? "";
  const values = options[listName];
  if (!values) {
    problems.push(`Node ${definition.id} references missing option list ${listName}`);
    return [];
  }

  const branches = definition.branches ?? {};
  for (const key of Object.keys(branches)) {
    if (!values.includes(key)) {
      problems.push(`Node ${definition.id} branches on ${key}, which is not in ${listName}`);
    }
  }

  return values.map((value, index) => ({
    input: String(index + 1),
    label: value,
    value,
    next: branches[value] ?? definition.next ?? "",
  }));
}

function toNode(
  definition: MenuNodeDefinitionUnion,
  options: Record<string, string[]>,
  problems: string[],
): MenuTreeNode {
  switch (definition.type) {
    case NODE_TYPES.MENU:
      return {
        type: NODE_TYPES.MENU,
        id: definition.id,
        prompt: definition.prompt,
        field: definition.field,
        back: definition.back ?? false,
        choices: expandMenuChoices(definition, options, problems),
      };
    case NODE_TYPES.INPUT:
      return { ...definition, back: definition.back ?? false };
    case NODE_TYPES.LISTING_PAGE:
      return { ...definition, back: definition.back ?? false };
    case NODE_TYPES.TERMINAL:
      return {
        type: NODE_TYPES.TERMINAL,
        id: definition.id,
        prompt: definition.prompt,
        effect: definition.effect ?? TERMINAL_EFFECTS.NONE,
        outcome: definition.outcome ?? "completed",
      };
  }
}

/** Validates a declarative definition and builds the tree from it */
export function buildMenuTree(definition: unknown): MenuTree {
  const { error, value } = menuTreeSchema.validate(definition, { abortEarly: false });
  if (error) {
    throw new ConfigurationError(
      `Menu tree definition is malformed: ${error.message}`,
      error.details.map((detail) => detail.message),
    );
  }

  const tree: MenuTreeDefinition = value;
  const options = tree.options ?? {};
  const problems: string[] = [];
  const nodes = tree.nodes.map((node) => toNode(node, options, problems));

  if (problems.length > 0) {
    throw new ConfigurationError(`Menu tree is invalid: ${problems.join("; ")}`, problems);
  }

  return new MenuTree(tree.root, nodes, { ...tree.messages });
}

/** Reads the JSON definition at `filePath` (relative paths resolve from the working directory) */
export async function loadMenuTree(filePath: string): Promise<MenuTree> {
  const resolved = path.resolve(process.cwd(), filePath);
  let parsed: unknown;

  try {
    parsed = JSON.parse(await readFile(resolved, "utf8"));
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read menu tree from ${resolved}: ${describeError(error)}`,
    );
  }

  return buildMenuTree(parsed);
}
