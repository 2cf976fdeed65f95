import { Controller, Get, Inject } from "@nestjs/common";
import { MENU_TREE, MenuTree } from "./menu-tree";
import { BACK_INPUT, MenuTreeNode, NODE_TYPES } from "./types/menu.types";

export interface MenuScreenPreview {
  id: string;
  type: MenuTreeNode["type"];
  screen: string;
}

export interface MenuOverview {
  root: string;
  screens: MenuScreenPreview[];
}

/** Public read-only view of the dialog, for demos and partner onboarding */
@Controller("menu")
export class MenuController {
  constructor(@Inject(MENU_TREE) private readonly menuTree: MenuTree) {}

  @Get()
  getOverview(): MenuOverview {
    return {
      root: this.menuTree.root,
      screens: this.menuTree.nodeIds().map((id) => this.preview(this.menuTree.getNode(id))),
    };
  }

  private preview(node: MenuTreeNode): MenuScreenPreview {
    const lines = [node.prompt];

    if (node.type === NODE_TYPES.MENU) {
      lines.push(...node.choices.map((choice) => `${choice.input}. ${choice.label}`));
    } else if (node.type === NODE_TYPES.LISTING_PAGE) {
      lines.push("(matching listings)");
    }

    if (node.type !== NODE_TYPES.TERMINAL && node.back) {
      lines.push(`${BACK_INPUT}. ${this.menuTree.messages.backLabel}`);
    }

    return { id: node.id, type: node.type, screen: lines.join("\n") };
  }
}
