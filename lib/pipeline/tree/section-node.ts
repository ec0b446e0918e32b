import { FrozenNodeError } from "../../errors";
import type { Block, HeadingCandidateBlock, NumberingInfo, PageSpan } from "../core/types";

export interface SectionMeta {
  numbering?: NumberingInfo;
  headingFontSize?: number;
}

export interface SectionNodeInit {
  title: string;
  level: number;
  pages: PageSpan;
  slug?: string;
  meta?: SectionMeta;
  /** The heading block this section was opened by */
  heading?: HeadingCandidateBlock;
}

/**
 * A node of the section tree. Built up by the tree builder, then frozen
 * once; every mutator throws FrozenNodeError afterwards.
 */
export class SectionNode {
  readonly title: string;
  readonly level: number;
  readonly heading: HeadingCandidateBlock | null;
  private _slug: string;
  private _pages: PageSpan;
  private _meta: SectionMeta;
  private readonly _children: SectionNode[] = [];
  private readonly _blocks: Block[] = [];
  private _frozen = false;

  constructor(init: SectionNodeInit) {
    if (!Number.isInteger(init.level) || init.level < 1) {
      throw new RangeError(`Section level must be a positive integer (got ${init.level})`);
    }
    this.title = init.title;
    this.level = init.level;
    this.heading = init.heading ?? null;
    this._slug = init.slug ?? "";
    this._pages = init.pages;
    this._meta = { ...init.meta };
  }

  get slug(): string {
    return this._slug;
  }

  get pages(): PageSpan {
    return this._pages;
  }

  get meta(): Readonly<SectionMeta> {
    return this._meta;
  }

  get children(): readonly SectionNode[] {
    return this._children;
  }

  get blocks(): readonly Block[] {
    return this._blocks;
  }

  get frozen(): boolean {
    return this._frozen;
  }

  addChild(child: SectionNode): void {
    this.assertMutable("addChild");
    this._children.push(child);
  }

  /** Append a content block; the page span grows to cover it. */
  addBlock(block: Block): void {
    this.assertMutable("addBlock");
    this._blocks.push(block);
    const [first, last] = this._pages;
    this._pages = [Math.min(first, block.pageSpan[0]), Math.max(last, block.pageSpan[1])];
  }

  setMeta(patch: SectionMeta): void {
    this.assertMutable("setMeta");
    this._meta = { ...this._meta, ...patch };
  }

  setSlug(slug: string): void {
    this.assertMutable("setSlug");
    this._slug = slug;
  }

  /**
   * Freeze this node and every descendant, together with the blocks they
   * hold and those blocks' metadata. Irreversible.
   */
  freeze(): void {
    if (this._frozen) return;
    for (const child of this._children) child.freeze();
    if (this.heading) freezeBlock(this.heading);
    for (const block of this._blocks) freezeBlock(block);
    Object.freeze(this._children);
    Object.freeze(this._blocks);
    Object.freeze(this._meta);
    this._frozen = true;
  }

  private assertMutable(operation: string): void {
    if (this._frozen) throw new FrozenNodeError(this.title, operation);
  }
}

function freezeBlock(block: Block): void {
  if ("meta" in block) Object.freeze(block.meta);
  Object.freeze(block);
}

/**
 * Pre-order walk: every parent before its children.
 */
export function preorder(roots: readonly SectionNode[]): SectionNode[] {
  const out: SectionNode[] = [];
  const visit = (node: SectionNode) => {
    out.push(node);
    for (const child of node.children) visit(child);
  };
  for (const root of roots) visit(root);
  return out;
}
