import type cytoscape from 'cytoscape';
import { DIMMED_OPACITY, type GraphColorPalette } from './graphColors';

type StyleRule = cytoscape.StylesheetStyle;

/** Returns all edge-related Cytoscape style rules. Arrows only on directed graphs. */
export function getDefaultEdgeStyles(colors: GraphColorPalette, font: string, directed: boolean): StyleRule[] {
  return [
    {
      selector: 'edge',
      style: {
        'line-color': colors.lineColor,
        'width': 1.5,
        'curve-style': 'bezier',
        'target-arrow-shape': directed ? 'triangle' : 'none',
        'target-arrow-color': colors.lineColor,
        'arrow-scale': 0.8,
        'font-family': font,
        'font-size': 8,
        'color': colors.textColor,
      }
    },

    {
      selector: 'edge[label]',
      style: {
        'label': 'data(label)',
        'text-rotation': 'autorotate',
      }
    },

    {
      selector: 'edge.highlighted',
      style: {
        'width': 3,
        'line-color': colors.lineHighlightColor,
        'target-arrow-color': colors.lineHighlightColor,
      }
    },

    {
      selector: 'edge.dimmed',
      style: {
        'opacity': DIMMED_OPACITY,
      }
    },
  ];
}
