/**
 * Mock: GPS Provider
 *
 * Simulates a receiver moving east at a constant speed. Publishes
 * "position" every tick and posts "gps.fix" on its first update.
 *
 * Settings: `lat`, `lon` (start, degrees), `speed` (degrees per second).
 */

import type { PluginDefinition } from "../plugins/api.js";
import { BasePlugin, MetadataBuilder, definePlugin } from "../sdk/plugin-sdk.js";
import type { TextFrame } from "./frame.js";

export interface Position {
  readonly lat: number;
  readonly lon: number;
  /** Number of fixes produced so far */
  readonly fixes: number;
}

export class GpsProviderPlugin extends BasePlugin<TextFrame> {
  private lat = 0;
  private lon = 0;
  private fixes = 0;

  override initialize(): boolean {
    this.lat = this.setting("lat", 0);
    this.lon = this.setting("lon", 0);
    return true;
  }

  update(deltaTime: number): void {
    this.lon += this.setting("speed", 0.001) * deltaTime;
    this.fixes++;
    this.provide<Position>("position", { lat: this.lat, lon: this.lon, fixes: this.fixes });
    if (this.fixes === 1) this.post("gps.fix", { lat: this.lat, lon: this.lon });
  }

  override render(frame: TextFrame): TextFrame {
    return [...frame, `GPS ${this.lat.toFixed(4)},${this.lon.toFixed(4)}`];
  }
}

export const gpsProviderPlugin: PluginDefinition<TextFrame> = definePlugin(
  MetadataBuilder.create("gps-provider")
    .version("1.0.0")
    .description("Simulated GPS receiver")
    .provides("position")
    .build(),
  (ctx) => new GpsProviderPlugin(ctx),
);
