// Browser bundles of the widget and its layout extensions, in page load order

import { createRequire } from 'module';
import path from 'path';

type Resolver = (specifier: string) => string;

export interface VendorScript {
  /** Served as /vendor/<file> */
  readonly file: string;
  readonly resolvePath: () => string;
}

const rootRequire: NodeRequire = createRequire(import.meta.url);

/** Resolves from inside `owner`, where npm may have nested its dependencies. */
function resolveFrom(owner: string): Resolver {
  const ownerRequire: NodeRequire = createRequire(rootRequire.resolve(owner));
  return (specifier: string) => ownerRequire.resolve(specifier);
}

function packageMain(name: string, from: () => Resolver = () => (specifier: string) => rootRequire.resolve(specifier)): VendorScript {
  return { file: `${name}.js`, resolvePath: () => from()(name) };
}

export const VENDOR_SCRIPTS: readonly VendorScript[] = [
  {
    file: 'cytoscape.min.js',
    resolvePath: () => path.join(path.dirname(rootRequire.resolve('cytoscape')), 'cytoscape.min.js'),
  },
  {
    // the package main is the CommonJS build; the browser bundle sits in dist/
    file: 'dagre.min.js',
    resolvePath: () => path.join(path.dirname(resolveFrom('cytoscape-dagre')('dagre')), 'dist', 'dagre.min.js'),
  },
  packageMain('cytoscape-dagre'),
  packageMain('klayjs', () => resolveFrom('cytoscape-klay')),
  packageMain('cytoscape-klay'),
  packageMain('cytoscape-euler'),
  packageMain('weaverjs', () => resolveFrom('cytoscape-spread')),
  packageMain('cytoscape-spread'),
  packageMain('layout-base', () => resolveFrom(resolveFrom('cytoscape-cose-bilkent')('cose-base'))),
  packageMain('cose-base', () => resolveFrom('cytoscape-cose-bilkent')),
  packageMain('cytoscape-cose-bilkent'),
];

export function findVendorScript(file: string): VendorScript | undefined {
  return VENDOR_SCRIPTS.find((script: VendorScript) => script.file === file);
}
