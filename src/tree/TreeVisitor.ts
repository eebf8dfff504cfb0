import { Marker, MarkerKind, TreeNode } from '../contracts'

export type VisitCallback = (node: TreeNode, depth: number) => 'stop' | void

/**
 * Visit every node of a tree in pre-order. Returning 'stop' from the callback
 * ends the walk early.
 *
 * Uses an explicit stack so deeply nested trees cannot overflow the call stack.
 */
export function visitTree(root: TreeNode | null, callback: VisitCallback): void {
  if (!root) return

  const stack: Array<{ node: TreeNode; depth: number }> = [{ node: root, depth: 0 }]
  while (stack.length > 0) {
    const entry = stack.pop()
    if (!entry) break

    if (callback(entry.node, entry.depth) === 'stop') {
      return
    }

    // Push in reverse so the first child is visited next
    for (let i = entry.node.children.length - 1; i >= 0; i--) {
      stack.push({ node: entry.node.children[i], depth: entry.depth + 1 })
    }
  }
}

export function findMarkers<K extends MarkerKind>(
  root: TreeNode | null,
  kind: K
): Array<Extract<Marker, { kind: K }>> {
  const found: Array<Extract<Marker, { kind: K }>> = []
  visitTree(root, node => {
    const marker = findFirstMarker(node.markers, kind)
    if (marker) {
      found.push(marker)
    }
  })
  return found
}

export function findFirstMarker<K extends MarkerKind>(
  markers: Marker[],
  kind: K
): Extract<Marker, { kind: K }> | undefined {
  for (const marker of markers) {
    if (isMarkerOfKind(marker, kind)) {
      return marker
    }
  }
  return undefined
}

export const isMarkerOfKind = <K extends MarkerKind>(
  marker: Marker,
  kind: K
): marker is Extract<Marker, { kind: K }> => marker.kind === kind
