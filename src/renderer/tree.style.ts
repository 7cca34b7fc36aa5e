/**
 * Tree Style
 *
 * Glyphs and switches used by TreeFormatter. Immutable; the with* helpers
 * return a new style.
 */

export interface TreeStyleOptions {
  /** Wrap node text in depth colors. */
  colored: boolean;
  /**
   * Emit the "Bus NNN" line above each bus. When off, a payload stored at
   * the bus root gets a line of its own instead.
   */
  showHeader: boolean;
  /** Continuation below a last sibling. */
  indent: string;
  /** Connector for a node with siblings after it. */
  branch: string;
  /** Connector for the last sibling. */
  corner: string;
  /** Continuation below a non-last sibling. */
  vertical: string;
}

const DEFAULTS: TreeStyleOptions = {
  colored: true,
  showHeader: true,
  indent: '    ',
  branch: '├── ',
  corner: '└── ',
  vertical: '│   ',
};

export class TreeStyle implements TreeStyleOptions {
  readonly colored: boolean;
  readonly showHeader: boolean;
  readonly indent: string;
  readonly branch: string;
  readonly corner: string;
  readonly vertical: string;

  constructor(options: Partial<TreeStyleOptions> = {}) {
    const resolved = { ...DEFAULTS, ...options };
    this.colored = resolved.colored;
    this.showHeader = resolved.showHeader;
    this.indent = resolved.indent;
    this.branch = resolved.branch;
    this.corner = resolved.corner;
    this.vertical = resolved.vertical;
  }

  /** Colored, Unicode box drawing. */
  static default(): TreeStyle {
    return new TreeStyle();
  }

  /** Unicode box drawing, no colors. */
  static plain(): TreeStyle {
    return new TreeStyle({ colored: false });
  }

  /** ASCII connectors for terminals without box-drawing glyphs. */
  static ascii(): TreeStyle {
    return new TreeStyle({ branch: '|-- ', corner: '`-- ', vertical: '|   ' });
  }

  withColor(colored: boolean): TreeStyle {
    return new TreeStyle({ ...this.toOptions(), colored });
  }

  withHeader(showHeader: boolean): TreeStyle {
    return new TreeStyle({ ...this.toOptions(), showHeader });
  }

  private toOptions(): TreeStyleOptions {
    return {
      colored: this.colored,
      showHeader: this.showHeader,
      indent: this.indent,
      branch: this.branch,
      corner: this.corner,
      vertical: this.vertical,
    };
  }
}
