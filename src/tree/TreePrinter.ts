import { Marker, SourceSnapshot, TreeNode } from '../contracts'

export interface MarkerPrinter {
  beforeSyntax(marker: Marker, node: TreeNode): string
  afterSyntax(marker: Marker, node: TreeNode): string
}

const fence = (marker: Marker): string => {
  switch (marker.kind) {
    case 'SearchResult':
    case 'ErrorMarkup':
      return `{{${marker.id}}}`
    case 'Generated':
    case 'Other':
      return ''
    default: {
      const unreachable: never = marker
      throw new Error(`Unknown marker: ${JSON.stringify(unreachable)}`)
    }
  }
}

/**
 * Only retains output for search results and error markup, fenced by the
 * marker id
 */
export const FencedMarkerPrinter: MarkerPrinter = {
  beforeSyntax: fence,
  afterSyntax: fence,
}

// Prints source exactly as it would be written to disk
export const SilentMarkerPrinter: MarkerPrinter = {
  beforeSyntax: () => '',
  afterSyntax: () => '',
}

export function printTree(root: TreeNode, markerPrinter: MarkerPrinter = SilentMarkerPrinter): string {
  let out = ''

  // Frames are either a node to open or the closing text of a node already opened
  const stack: Array<TreeNode | string> = [root]
  while (stack.length > 0) {
    const frame = stack.pop()
    if (frame === undefined) break
    if (typeof frame === 'string') {
      out += frame
      continue
    }

    out += frame.prefix
    for (const marker of frame.markers) {
      out += markerPrinter.beforeSyntax(marker, frame)
    }
    out += frame.text

    let closing = ''
    for (const marker of frame.markers) {
      closing += markerPrinter.afterSyntax(marker, frame)
    }
    if (closing) {
      stack.push(closing)
    }
    for (let i = frame.children.length - 1; i >= 0; i--) {
      stack.push(frame.children[i])
    }
  }

  return out
}

export const printSnapshot = (snapshot: SourceSnapshot, markerPrinter?: MarkerPrinter): string =>
  printTree(snapshot.tree, markerPrinter)
