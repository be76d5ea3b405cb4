import { THEME_NAMES, type ThemeName } from "../security/sanitizer.js";

export interface Theme {
  name: ThemeName;
  description: string;
  background: string;
  plotBackground: string;
  text: string;
  axis: string;
  grid: string;
  palette: readonly string[];
}

const THEMES: Record<ThemeName, Theme> = {
  light: {
    name: "light",
    description: "White background with dark text",
    background: "#ffffff",
    plotBackground: "#ffffff",
    text: "#222222",
    axis: "#444444",
    grid: "#e5e5e5",
    palette: ["#1f77b4", "#ff7f0e", "#2ca02c", "#d62728", "#9467bd"],
  },
  dark: {
    name: "dark",
    description: "Dark background with light text",
    background: "#1e1e1e",
    plotBackground: "#262626",
    text: "#e6e6e6",
    axis: "#bbbbbb",
    grid: "#3a3a3a",
    palette: ["#4fc3f7", "#ffb74d", "#81c784", "#e57373", "#ba68c8"],
  },
  bizlight: {
    name: "bizlight",
    description: "Muted corporate palette on a light background",
    background: "#fafafa",
    plotBackground: "#ffffff",
    text: "#2b2b2b",
    axis: "#5f6368",
    grid: "#dadce0",
    palette: ["#1a3a5f", "#4a7ba6", "#8fb3d9", "#c0504d", "#9bbb59"],
  },
  bizdark: {
    name: "bizdark",
    description: "Muted corporate palette on a navy background",
    background: "#14213d",
    plotBackground: "#1b2a4a",
    text: "#e5e5e5",
    axis: "#a8b2c7",
    grid: "#2e3f63",
    palette: ["#fca311", "#8ecae6", "#e5e5e5", "#e76f51", "#90be6d"],
  },
};

export function getTheme(name: ThemeName): Theme {
  return THEMES[name];
}

export function listThemes(): Theme[] {
  return THEME_NAMES.map((name) => THEMES[name]);
}
