export type DomOutput = Node | Node[];

export function toNodes(output: DomOutput): Node[] {
  return Array.isArray(output) ? output : [output];
}
