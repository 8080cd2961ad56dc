/** The `.kicad_pro` descriptor. It does not depend on the layout. */
export class ProjectGenerator {
  private name: string;

  constructor(name: string) {
    this.name = name;
  }

  generate(): string {
    return JSON.stringify({
      meta: { filename: `${this.name}.kicad_pro`, version: 1 },
      board: {
        design_settings: {
          defaults: {
            track_width: 0.25,
          },
          rules: {
            solder_mask_clearance: 0.0,
            solder_mask_min_width: 0.0,
            solder_paste_clearance: 0.0,
            solder_paste_margin: 0.0,
          },
        },
      },
      sheets: [],
    }, null, 2) + "\n";
  }
}
