/**
 * Default display names for evaders. Initials are distinct and avoid the map
 * glyphs, so each default evader draws as its own letter. A run can pass its
 * own roster; names repeat when there are more evaders than names.
 */
export const DEFAULT_ROSTER: string[] = [
  "Frodo", "Pippin", "Merry", "Bilbo", "Lobelia",
  "Hamfast", "Tom", "Drogo", "Esmeralda", "Gerontius",
];
