export type { CopySizer, CopySizing, SizingInput } from "./types.js";
export { ProportionalSizer, type ProportionalSizerConfig } from "./proportional-sizer.js";
export { screenTrade } from "./screen.js";
