import type cytoscape from 'cytoscape';
import { describeLegend, type LegendView } from '@/pure/categorical';
import { getGraphInfo } from '@/pure/graph/graph-operations/getGraphInfo';
import type { FilterState } from '@/pure/filter';
import { AVAILABLE_LAYOUTS, type LayoutName } from '@/pure/layouts';
import { NEIGHBORHOOD_POLICIES, type NeighborhoodPolicy, type SelectedNodeDetails } from '@/pure/selection';
import type { Scene } from '@/pure/scene';
import { renderSession, type DashboardSession, type SessionView } from '@/pure/session';
import { getDashboardStylesheet, sceneToElements } from '@/shell/UI/cytoscape-graph-ui';

export interface CategoricalAttributeView {
  readonly name: string;
  readonly values: readonly string[];
}

/** JSON body of GET /api/view and of every accepted event. */
export interface DashboardView {
  readonly graphInfo: string;
  readonly directed: boolean;
  readonly scene: Scene;
  readonly legend: LegendView;
  readonly elements: cytoscape.ElementDefinition[];
  readonly stylesheet: cytoscape.StylesheetStyle[];
  readonly selectionDetails: readonly SelectedNodeDetails[];
  readonly filter: FilterState;
  readonly neighborhoodPolicy: NeighborhoodPolicy;
  readonly layouts: readonly LayoutName[];
  readonly neighborhoodPolicies: readonly NeighborhoodPolicy[];
  readonly categoricalAttributes: readonly CategoricalAttributeView[];
}

export function buildDashboardView(session: DashboardSession): DashboardView {
  const { scene, selectionDetails }: SessionView = renderSession(session);
  return {
    graphInfo: getGraphInfo(session.graph),
    directed: session.graph.directed,
    scene,
    legend: describeLegend(session.colorMappings, scene.colorAttribute),
    elements: sceneToElements(scene),
    stylesheet: getDashboardStylesheet(session.graph.directed),
    selectionDetails,
    filter: session.filter,
    neighborhoodPolicy: session.neighborhoodPolicy,
    layouts: AVAILABLE_LAYOUTS,
    neighborhoodPolicies: NEIGHBORHOOD_POLICIES,
    categoricalAttributes: [...session.categoricalAttributes].map(([name, values]) => ({ name, values })),
  };
}
