/**
 * Mock: Navigation
 *
 * Hard-depends on gps-provider and reads "position" every tick. Publishes
 * the distance travelled since its first fix as "route".
 */

import type { PluginDefinition, RuntimeEvent } from "../plugins/api.js";
import { BasePlugin, MetadataBuilder, definePlugin } from "../sdk/plugin-sdk.js";
import type { TextFrame } from "./frame.js";
import type { Position } from "./gps-provider-plugin.js";

export interface Route {
  readonly distance: number;
}

export class NavigationPlugin extends BasePlugin<TextFrame> {
  private origin?: Position;
  private distance = 0;
  /** "gps.fix" events seen */
  fixEvents = 0;

  update(_deltaTime: number): void {
    const position = this.require<Position>("position");
    this.origin ??= position;
    this.distance = Math.hypot(position.lat - this.origin.lat, position.lon - this.origin.lon);
    this.provide<Route>("route", { distance: this.distance });
  }

  override handleEvent(event: RuntimeEvent): void {
    if (event.topic === "gps.fix") this.fixEvents++;
  }

  override render(frame: TextFrame): TextFrame {
    return [...frame, `NAV ${this.distance.toFixed(4)}`];
  }
}

export const navigationPlugin: PluginDefinition<TextFrame> = definePlugin(
  MetadataBuilder.create("navigation")
    .version("1.0.0")
    .description("Distance travelled since the first fix")
    .provides("route")
    .consumes("position")
    .dependsOn("gps-provider")
    .build(),
  (ctx) => new NavigationPlugin(ctx),
);
