/**
 * Mock: FPS Counter
 *
 * Measures ticks per second from the update delta and toggles its own
 * overlay when the "f" key is pressed.
 */

import type { KeyCode, PluginDefinition } from "../plugins/api.js";
import { BasePlugin, MetadataBuilder, definePlugin } from "../sdk/plugin-sdk.js";
import type { TextFrame } from "./frame.js";

export const FPS_TOGGLE_KEY = "f";

export class FpsCounterPlugin extends BasePlugin<TextFrame> {
  private fps = 0;

  update(deltaTime: number): void {
    if (deltaTime <= 0) return;
    this.fps = Math.round(1 / deltaTime);
    this.provide("fps", this.fps);
  }

  override handleKey(key: KeyCode): boolean {
    if (key !== FPS_TOGGLE_KEY) return false;
    const visible = this.toggleVisibility();
    this.log.debug(`Overlay ${visible ? "shown" : "hidden"}`);
    return true;
  }

  override render(frame: TextFrame): TextFrame {
    return [...frame, `FPS ${this.fps}`];
  }
}

export const fpsCounterPlugin: PluginDefinition<TextFrame> = definePlugin(
  MetadataBuilder.create("fps-counter").version("1.0.0").provides("fps").build(),
  (ctx) => new FpsCounterPlugin(ctx),
);
