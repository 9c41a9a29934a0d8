/** Neutral colours for elements without a category colour */
export interface GraphColorPalette {
  fillColor: string;
  borderColor: string;
  selectedBorderColor: string;
  lineColor: string;
  lineHighlightColor: string;
  textColor: string;
}

export const DEFAULT_COLORS: GraphColorPalette = {
  fillColor: '#8a8a8a',
  borderColor: '#666666',
  selectedBorderColor: '#4b96ff',
  lineColor: '#b0b0b0',
  lineHighlightColor: '#ff9f1c',
  textColor: '#222222',
};

export const DEFAULT_FONT: string = '"Fira Code", Menlo, Consolas, "DejaVu Sans Mono", monospace';

/** Opacity of nodes and edges outside the active filter */
export const DIMMED_OPACITY: number = 0.15;
