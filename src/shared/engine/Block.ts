/**
 * A rectangular puzzle piece.
 *
 * Shape and identity are fixed at construction; only the top-left corner
 * moves. Boards never share Block instances: every Board.clone() copies
 * each block through {@link Block.clone}.
 */
export class Block {
  readonly id: number;
  readonly width: number;
  readonly height: number;
  x: number;
  y: number;

  constructor(id: number, width: number, height: number, x: number, y: number) {
    this.id = id;
    this.width = width;
    this.height = height;
    this.x = x;
    this.y = y;
  }

  /** Strict 2D interval overlap with the given rectangle. */
  overlaps(x: number, y: number, width: number, height: number): boolean {
    return x < this.x + this.width && x + width > this.x && y < this.y + this.height && y + height > this.y;
  }

  clone(): Block {
    return new Block(this.id, this.width, this.height, this.x, this.y);
  }
}
