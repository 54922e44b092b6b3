/**
 * Terminal UI for controlling key lights.
 * Uses blessed for the TUI framework.
 */

import blessed from "blessed";
import {
  type LightStatus,
  BRIGHTNESS_RANGE,
  TEMPERATURE_RANGE,
  temperatureToKelvin,
} from "./api.js";
import type { Device } from "./device.js";

export interface LightView {
  device: Device;
  status: LightStatus | null;
  lastError: string | null;
  lastUpdate: Date | null;
}

const EMPTY_KEY = "__empty__";

/** Escapes blessed tag braces in free text. */
export function escapeTags(text: string): string {
  return text.replace(/[{}]/g, (ch) => (ch === "{" ? "{open}" : "{close}"));
}

export function levelBar(
  value: number,
  range: { min: number; max: number },
  width: number,
  color: string
): string {
  const ratio = Math.max(0, Math.min(1, (value - range.min) / (range.max - range.min)));
  const filled = Math.round(ratio * width);
  const bar = "█".repeat(filled) + "░".repeat(width - filled);
  return `{${color}-fg}${bar}{/${color}-fg}`;
}

export function renderLightContent(view: LightView, width: number): string {
  if (view.lastError && !view.status) {
    return `\n  {red-fg}Error: ${escapeTags(view.lastError)}{/red-fg}\n\n  Retrying...`;
  }

  if (!view.status) {
    return "\n  {yellow-fg}Connecting...{/yellow-fg}";
  }

  const light = view.status;
  const barWidth = Math.max(10, width - 24);
  const lines: string[] = [];

  lines.push(
    light.on === 1
      ? "  {bold}Power{/bold}        {yellow-fg}{bold}ON{/bold}{/yellow-fg}"
      : "  {bold}Power{/bold}        {gray-fg}OFF{/gray-fg}"
  );
  lines.push("");
  lines.push(
    `  {bold}Brightness{/bold}  ${`${light.brightness}%`.padStart(6)}  ${levelBar(
      light.brightness,
      BRIGHTNESS_RANGE,
      barWidth,
      "yellow"
    )}`
  );
  // Higher mireds are warmer, so the bar fills toward warm.
  lines.push(
    `  {bold}Temperature{/bold} ${`${temperatureToKelvin(light.temperature)}K`.padStart(6)}  ${levelBar(
      light.temperature,
      TEMPERATURE_RANGE,
      barWidth,
      "#ff9900"
    )}`
  );

  if (view.lastError) {
    lines.push("");
    lines.push(`  {red-fg}${escapeTags(view.lastError)}{/red-fg}`);
  }

  if (view.lastUpdate) {
    lines.push("");
    lines.push(`  {gray-fg}Updated: ${view.lastUpdate.toLocaleTimeString()}{/gray-fg}`);
  }

  return lines.join("\n");
}

export class Dashboard {
  private screen: blessed.Widgets.Screen;
  private headerBox: blessed.Widgets.BoxElement;
  private lightBoxes: Map<string, blessed.Widgets.BoxElement> = new Map();
  private logBox: blessed.Widgets.BoxElement;
  private statusBar: blessed.Widgets.BoxElement;
  private logMessages: string[] = [];

  constructor() {
    this.screen = blessed.screen({
      smartCSR: true,
      title: "Key Light TUI",
      fullUnicode: true,
    });

    this.headerBox = blessed.box({
      parent: this.screen,
      top: 0,
      left: 0,
      width: "100%",
      height: 3,
      tags: true,
      content: this.renderHeader(),
      style: {
        fg: "white",
        bg: "black",
      },
    });

    this.logBox = blessed.box({
      parent: this.screen,
      bottom: 1,
      left: 0,
      width: "100%",
      height: 6,
      label: " Log ",
      tags: true,
      border: { type: "line" },
      scrollable: true,
      alwaysScroll: true,
      style: {
        fg: "white",
        border: { fg: "gray" },
        label: { fg: "gray" },
      },
    });

    this.statusBar = blessed.box({
      parent: this.screen,
      bottom: 0,
      left: 0,
      width: "100%",
      height: 1,
      tags: true,
      content:
        " {bold}q{/bold} Quit  {bold}←→{/bold} Select  {bold}t{/bold} Toggle  {bold}+/-{/bold} Brightness  {bold}w/c{/bold} Warmer/Cooler  {bold}r{/bold} Refresh  {bold}a{/bold} Add  {bold}d{/bold} Discovery",
      style: {
        fg: "white",
        bg: "#333333",
      },
    });
  }

  private renderHeader(): string {
    const title = "{bold}{yellow-fg} ☀  Key Light TUI {/yellow-fg}{/bold}";
    const subtitle = "{gray-fg}Network key light control{/gray-fg}";
    return `${title}  ${subtitle}`;
  }

  onKey(
    keys: string | string[],
    handler: (ch: string, key: blessed.Widgets.Events.IKeyEventArg) => void
  ): void {
    this.screen.key(keys, handler);
  }

  log(message: string, isError = false): void {
    const ts = new Date().toLocaleTimeString();
    const text = isError ? `{red-fg}${escapeTags(message)}{/red-fg}` : escapeTags(message);
    this.logMessages.push(`{gray-fg}${ts}{/gray-fg} ${text}`);
    if (this.logMessages.length > 100) {
      this.logMessages.shift();
    }
    this.logBox.setContent(this.logMessages.slice(-4).join("\n"));
    this.render();
  }

  showPrompt(label: string, callback: (value: string | null) => void): void {
    const prompt = blessed.textbox({
      parent: this.screen,
      top: "center",
      left: "center",
      width: 50,
      height: 3,
      label: ` ${label} `,
      tags: true,
      border: { type: "line" },
      style: {
        fg: "white",
        bg: "black",
        border: { fg: "yellow" },
        label: { fg: "yellow" },
      },
      inputOnFocus: true,
    });

    prompt.focus();
    prompt.readInput((err, value) => {
      prompt.destroy();
      this.render();
      if (err || value === undefined) {
        callback(null);
      } else {
        callback(value.trim() || null);
      }
    });
    this.render();
  }

  updateLights(views: LightView[], selected: string | null): void {
    for (const [name, box] of this.lightBoxes) {
      if (name !== EMPTY_KEY && !views.find((v) => v.device.name === name)) {
        box.destroy();
        this.lightBoxes.delete(name);
      }
    }

    const contentTop = 3;
    const contentBottom = 7; // log box height + status bar
    const availableHeight = (this.screen.height as number) - contentTop - contentBottom;
    const availableWidth = this.screen.width as number;

    if (views.length === 0) {
      if (!this.lightBoxes.has(EMPTY_KEY)) {
        const emptyBox = blessed.box({
          parent: this.screen,
          top: contentTop,
          left: 0,
          width: "100%",
          height: availableHeight,
          tags: true,
          content: this.renderEmptyState(),
          valign: "middle",
          align: "center",
          style: { fg: "gray" },
        });
        this.lightBoxes.set(EMPTY_KEY, emptyBox);
      }
      this.render();
      return;
    }

    const emptyBox = this.lightBoxes.get(EMPTY_KEY);
    if (emptyBox) {
      emptyBox.destroy();
      this.lightBoxes.delete(EMPTY_KEY);
    }

    const cols = Math.min(3, views.length);
    const rows = Math.ceil(views.length / cols);
    const boxWidth = Math.floor(availableWidth / cols);
    const boxHeight = Math.max(10, Math.floor(availableHeight / rows));

    views.forEach((view, i) => {
      const col = i % cols;
      const row = Math.floor(i / cols);
      const isSelected = view.device.name === selected;

      let box = this.lightBoxes.get(view.device.name);
      if (!box) {
        box = blessed.box({
          parent: this.screen,
          tags: true,
          border: { type: "line" },
          style: {
            fg: "white",
            border: { fg: "gray" },
            label: { fg: "gray", bold: true },
          },
        });
        this.lightBoxes.set(view.device.name, box);
      }

      box.top = contentTop + row * boxHeight;
      box.left = col * boxWidth;
      box.width = col === cols - 1 ? availableWidth - col * boxWidth : boxWidth;
      box.height = boxHeight;
      box.style.border.fg = isSelected ? "yellow" : "gray";
      box.style.label.fg = isSelected ? "yellow" : "gray";
      box.setLabel(` ${isSelected ? "▶ " : ""}${escapeTags(view.device.name)} (${new URL(view.device.url).host}) `);
      box.setContent(renderLightContent(view, boxWidth - 4));
    });

    this.render();
  }

  private renderEmptyState(): string {
    return [
      "",
      "{bold}No key lights found{/bold}",
      "",
      "Searching via mDNS discovery...",
      "",
      "Press {bold}a{/bold} to add a light by host:port",
      "Press {bold}d{/bold} to restart discovery",
      "Press {bold}q{/bold} to quit",
    ].join("\n");
  }

  render(): void {
    this.screen.render();
  }

  destroy(): void {
    this.screen.destroy();
  }
}
