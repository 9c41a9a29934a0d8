import type cytoscape from 'cytoscape';
import { DEFAULT_COLORS, DEFAULT_FONT } from './graphColors';
import { getDefaultNodeStyles } from './defaultNodeStyles';
import { getDefaultEdgeStyles } from './defaultEdgeStyles';

/**
 * Full dashboard stylesheet. Serializable: the server sends it to the page
 * as JSON.
 */
export function getDashboardStylesheet(directed: boolean): cytoscape.StylesheetStyle[] {
  return [
    ...getDefaultNodeStyles(DEFAULT_COLORS, DEFAULT_FONT),
    ...getDefaultEdgeStyles(DEFAULT_COLORS, DEFAULT_FONT, directed),
  ];
}
