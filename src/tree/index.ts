export { visitTree, findMarkers, findFirstMarker, isMarkerOfKind, VisitCallback } from './TreeVisitor'
export { printTree, printSnapshot, MarkerPrinter, FencedMarkerPrinter, SilentMarkerPrinter } from './TreePrinter'
export { normalizeTree, textTree } from './normalize'
