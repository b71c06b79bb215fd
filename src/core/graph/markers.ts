import { NodeKind } from './types';

/**
 * Line prefixes of the data file.  Rendered paths reuse them as delimiters,
 * e.g. `<a>Bacon, Kevin (I)<a><t>Apollo 13 (1995)<t>`.
 */
export const NODE_MARKERS: Readonly<Record<NodeKind, string>> = {
    actor: '<a>',
    movie: '<t>',
};
