import { TreeNode } from '../contracts'
import { TreeNodeInput } from '../contracts/schemas'

export function normalizeTree(input: TreeNodeInput): TreeNode {
  return {
    prefix: input.prefix ?? '',
    text: input.text ?? '',
    markers: input.markers ? [...input.markers] : [],
    children: (input.children ?? []).map(normalizeTree),
  }
}

/**
 * Build a single-node tree holding plain file content
 */
export const textTree = (text: string, markers: TreeNode['markers'] = []): TreeNode => ({
  prefix: '',
  text,
  markers,
  children: [],
})
