export interface PackRect {
  id: number;
  width: number;
  height: number;
  x: number;
  y: number;
  wasPacked: boolean;
}

interface SkylineNode {
  x: number;
  y: number;
  width: number;
}

interface Candidate {
  index: number;
  y: number;
  waste: number;
}

/**
 * Bottom-left skyline rectangle packer.
 *
 * The skyline is a run of horizontal segments covering [0, width); each
 * rectangle sits on the lowest stretch that can hold it.
 */
export class SkylinePacker {
  private nodes: SkylineNode[];

  constructor(
    readonly width: number,
    readonly height: number,
  ) {
    this.nodes = [{ x: 0, y: 0, width }];
  }

  /** Annotates every rect in place. Returns true when all of them were packed. */
  pack(rects: PackRect[]): boolean {
    const order = rects.map((_, i) => i).sort((a, b) => rects[b].height - rects[a].height || rects[b].width - rects[a].width || a - b);
    let allPacked = true;

    for (const i of order) {
      const rect = rects[i];

      if (rect.width === 0 || rect.height === 0) {
        rect.x = 0;
        rect.y = 0;
        rect.wasPacked = true;
        continue;
      }

      const candidate = this.findPosition(rect.width, rect.height);
      if (!candidate) {
        rect.x = 0;
        rect.y = 0;
        rect.wasPacked = false;
        allPacked = false;
        continue;
      }

      rect.x = this.nodes[candidate.index].x;
      rect.y = candidate.y;
      rect.wasPacked = true;
      this.place(candidate.index, rect.x, candidate.y, rect.width, rect.height);
    }

    return allPacked;
  }

  get skyline(): ReadonlyArray<Readonly<SkylineNode>> {
    return this.nodes;
  }

  private findPosition(width: number, height: number): Candidate | null {
    let best: Candidate | null = null;

    for (let i = 0; i < this.nodes.length; i++) {
      if (this.nodes[i].x + width > this.width) break;

      const { y, waste } = this.fitAt(i, width);
      if (y + height > this.height) continue;

      if (!best || y < best.y || (y === best.y && waste < best.waste)) {
        best = { index: i, y, waste };
      }
    }

    return best;
  }

  private fitAt(index: number, width: number): { y: number; waste: number } {
    const left = this.nodes[index].x;
    const right = left + width;
    let y = 0;
    let waste = 0;
    let covered = 0;

    for (let j = index; j < this.nodes.length && this.nodes[j].x < right; j++) {
      const node = this.nodes[j];
      const overlap = Math.min(node.x + node.width, right) - node.x;

      if (node.y > y) {
        // Raising the floor leaves a gap under everything already spanned
        waste += covered * (node.y - y);
        y = node.y;
      } else {
        waste += overlap * (y - node.y);
      }
      covered += overlap;
    }

    return { y, waste };
  }

  private place(index: number, x: number, y: number, width: number, height: number): void {
    const right = x + width;
    let end = index;

    while (end < this.nodes.length && this.nodes[end].x + this.nodes[end].width <= right) end++;

    if (end < this.nodes.length && this.nodes[end].x < right) {
      const partial = this.nodes[end];
      partial.width -= right - partial.x;
      partial.x = right;
    }

    this.nodes.splice(index, end - index, { x, y: y + height, width });

    for (let i = 0; i < this.nodes.length - 1; ) {
      if (this.nodes[i].y === this.nodes[i + 1].y) {
        this.nodes[i].width += this.nodes[i + 1].width;
        this.nodes.splice(i + 1, 1);
      } else {
        i++;
      }
    }
  }
}
