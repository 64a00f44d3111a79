export const STYLE_NAMES = ["plasma", "waves", "ember"] as const;

export type StyleName = (typeof STYLE_NAMES)[number];

export const DEFAULT_STYLE: StyleName = "plasma";

export type PaletteColor =
  | "black"
  | "red"
  | "darkRed"
  | "yellow"
  | "darkYellow"
  | "blue"
  | "cyan"
  | "magenta"
  | "darkMagenta";

export interface StyleDefinition {
  /** Glyphs ordered from sparsest to densest. */
  ramp: string;
  palette: readonly PaletteColor[];
}

export const STYLES: Readonly<Record<StyleName, StyleDefinition>> = {
  plasma: {
    ramp: " .:+*#%@",
    palette: ["magenta", "darkMagenta", "blue", "black"],
  },
  waves: {
    ramp: " .-~*~=",
    palette: ["blue", "cyan", "black"],
  },
  ember: {
    ramp: " `^\";",
    palette: ["darkRed", "red", "darkYellow", "yellow"],
  },
};

export function isStyleName(value: unknown): value is StyleName {
  return typeof value === "string" && (STYLE_NAMES as readonly string[]).includes(value);
}

/** Colors cycle by row so short frames repeat gracefully and tall ones use the whole palette. */
export function colorForRow(palette: readonly PaletteColor[], row: number): PaletteColor {
  return palette[row % palette.length];
}
