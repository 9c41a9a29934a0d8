import type cytoscape from 'cytoscape';
import { DIMMED_OPACITY, type GraphColorPalette } from './graphColors';

type StyleRule = cytoscape.StylesheetStyle;

/** Returns all node-related Cytoscape style rules */
export function getDefaultNodeStyles(colors: GraphColorPalette, font: string): StyleRule[] {
  return [
    {
      selector: 'node',
      style: {
        'background-color': colors.fillColor,
        'label': 'data(label)',
        'color': colors.textColor,
        'font-family': font,
        'font-size': 11,
        'text-valign': 'bottom',
        'text-halign': 'center',
        'text-margin-y': 6,
        'width': 24,
        'height': 24,
        'border-width': 1,
        'border-color': colors.borderColor,
      }
    },

    // Category colour, present only when the colour attribute maps the node's value
    {
      selector: 'node[color]',
      style: {
        'background-color': 'data(color)',
      }
    },

    {
      selector: 'node.highlighted',
      style: {
        'border-width': 3,
        'border-color': colors.lineHighlightColor,
      }
    },

    {
      selector: 'node.selected',
      style: {
        'border-width': 4,
        'border-color': colors.selectedBorderColor,
        'font-weight': 'bold',
      }
    },

    {
      selector: 'node.dimmed',
      style: {
        'opacity': DIMMED_OPACITY,
      }
    },
  ];
}
