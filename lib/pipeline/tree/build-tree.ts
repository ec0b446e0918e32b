import type { Block } from "../core/types";
import { assignHeadingLevels } from "../headings/assign-heading-levels";
import type { NumberingProcessor } from "../headings/numbering";
import type { SlugAllocator } from "../slug";
import { SectionNode } from "./section-node";

export interface BuildTreeDeps {
  numbering: NumberingProcessor;
  slugs: SlugAllocator;
}

/**
 * Build the frozen section tree from the ordered block list.
 *
 * Headings are placed with an ancestor stack: entries at the same or a
 * deeper level are popped, the heading attaches to the stack top (or
 * becomes a root) and is pushed. Other blocks go to the most recent heading;
 * blocks before the first heading are not part of the tree. Slugs are
 * allocated in heading order, prefixed by heading index, before freezing.
 */
export function buildTree(blocks: readonly Block[], deps: BuildTreeDeps): SectionNode[] {
  const headings = assignHeadingLevels(blocks, deps.numbering);
  if (headings.length === 0) return [];

  const nodeByBlock = new Map<Block, SectionNode>();
  const roots: SectionNode[] = [];
  const stack: SectionNode[] = [];

  headings.forEach(({ block, level }, index) => {
    const node = new SectionNode({
      title: block.text,
      level,
      pages: block.pageSpan,
      slug: deps.slugs.allocate(block.text, index),
      heading: block,
      meta: {
        headingFontSize: block.meta.fontSize,
        ...(block.meta.numbering && { numbering: block.meta.numbering }),
      },
    });
    nodeByBlock.set(block, node);

    let parent = stack.at(-1);
    while (parent && parent.level >= level) {
      stack.pop();
      parent = stack.at(-1);
    }
    if (parent) {
      parent.addChild(node);
    } else {
      roots.push(node);
    }
    stack.push(node);
  });

  let current: SectionNode | undefined;
  for (const block of blocks) {
    const node = nodeByBlock.get(block);
    if (node) {
      current = node;
    } else if (current) {
      current.addBlock(block);
    }
  }

  for (const root of roots) root.freeze();
  return roots;
}
