import type cytoscape from 'cytoscape';
import type { EdgeVisualSpec, NodeVisualSpec, Scene } from '@/pure/scene';

function classesOf(spec: { readonly highlighted: boolean; readonly visibility: string }, selected: boolean): string {
  const classes: readonly string[] = [
    ...(selected ? ['selected'] : []),
    ...(spec.highlighted ? ['highlighted'] : []),
    ...(spec.visibility === 'dimmed' ? ['dimmed'] : []),
  ];
  return classes.join(' ');
}

function nodeElement(spec: NodeVisualSpec): cytoscape.ElementDefinition {
  return {
    group: 'nodes',
    data: {
      id: spec.id,
      label: spec.label,
      // node[color] must not match uncoloured nodes
      ...(spec.color === null ? {} : { color: spec.color }),
      ...(spec.colorCategory === null ? {} : { colorCategory: spec.colorCategory }),
    },
    classes: classesOf(spec, spec.selected),
  };
}

function edgeElement(spec: EdgeVisualSpec): cytoscape.ElementDefinition {
  return {
    group: 'edges',
    data: {
      id: spec.id,
      source: spec.source,
      target: spec.target,
      ...(spec.label === null ? {} : { label: spec.label }),
    },
    classes: classesOf(spec, false),
  };
}

/** Cytoscape element definitions for a scene, nodes before edges. */
export function sceneToElements(scene: Scene): cytoscape.ElementDefinition[] {
  return [
    ...scene.nodes.map(nodeElement),
    ...scene.edges.map(edgeElement),
  ];
}
