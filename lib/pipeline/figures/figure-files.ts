import { slugify } from "../slug";

const FIGURE_ID_WIDTH = 3;

/** 0-based index to "fig_000". */
export function figureId(index: number): string {
  return `fig_${String(index).padStart(FIGURE_ID_WIDTH, "0")}`;
}

/**
 * Allocates figure filenames for one document: `<id>_<caption-slug>.<ext>`,
 * or `<id>.<ext>` when there is no usable caption. A name already handed out
 * gets `-2`, `-3`, ... before the extension.
 */
export class FigureFilenameAllocator {
  private readonly used = new Set<string>();

  constructor(private readonly imageFormat: string) {}

  allocate(id: string, caption: string | null): string {
    const captionSlug = caption ? slugify(caption) : "";
    const stem = captionSlug ? `${id}_${captionSlug}` : id;

    let filename = `${stem}.${this.imageFormat}`;
    for (let counter = 2; this.used.has(filename); counter++) {
      filename = `${stem}-${counter}.${this.imageFormat}`;
    }
    this.used.add(filename);
    return filename;
  }
}
