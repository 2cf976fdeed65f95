import { Module } from "@nestjs/common";
import { USSD_CONFIG, UssdConfig } from "../../config/ussd.config";
import { MenuController } from "./menu.controller";
import { MENU_TREE, loadMenuTree } from "./menu-tree";

@Module({
  controllers: [MenuController],
  providers: [
    {
      provide: MENU_TREE,
      useFactory: (config: UssdConfig) => loadMenuTree(config.menuTreePath),
      inject: [USSD_CONFIG],
    },
  ],
  exports: [MENU_TREE],
})
export class MenuModule {}
