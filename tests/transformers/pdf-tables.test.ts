import { describe, it, expect } from "vitest";
import { detectTables, type PositionedWord } from "../../src/transformers/pdf-tables.js";

const INVENTORY: PositionedWord[] = [
  { text: "Item", x0: 10, x1: 40, top: 10 },
  { text: "Name", x0: 45, x1: 80, top: 10 },
  { text: "Qty", x0: 200, x1: 225, top: 10 },
  { text: "Unit", x0: 400, x1: 430, top: 10 },
  { text: "Price", x0: 435, x1: 470, top: 10 },

  { text: "Blue", x0: 10, x1: 38, top: 30 },
  { text: "Widget", x0: 43, x1: 88, top: 30 },
  { text: "5", x0: 200, x1: 208, top: 30 },
  { text: "$10", x0: 400, x1: 425, top: 30 },

  { text: "Red", x0: 10, x1: 35, top: 50 },
  { text: "Gadget", x0: 40, x1: 85, top: 50 },
  { text: "3", x0: 200, x1: 208, top: 50 },
  { text: "$20", x0: 400, x1: 425, top: 50 },

  { text: "Steel", x0: 10, x1: 45, top: 70 },
  { text: "Bolt", x0: 50, x1: 80, top: 70 },
  { text: "100", x0: 200, x1: 225, top: 70 },
  { text: "$1", x0: 400, x1: 415, top: 70 },
];

const INVENTORY_ROWS = [
  ["Item Name", "Qty", "Unit Price"],
  ["Blue Widget", "5", "$10"],
  ["Red Gadget", "3", "$20"],
  ["Steel Bolt", "100", "$1"],
];

describe("detectTables", () => {
  it("splits multi-word cells from their columns", () => {
    // Small gaps inside cells, large ones between columns.
    const words: PositionedWord[] = [
      { text: "Full", x0: 10, x1: 35, top: 10 },
      { text: "Name", x0: 40, x1: 70, top: 10 },
      { text: "Age", x0: 200, x1: 225, top: 10 },
      { text: "(years)", x0: 230, x1: 275, top: 10 },
      { text: "Home", x0: 400, x1: 430, top: 10 },
      { text: "City", x0: 435, x1: 465, top: 10 },
      { text: "Alice", x0: 10, x1: 45, top: 30 },
      { text: "Marie", x0: 50, x1: 85, top: 30 },
      { text: "Smith", x0: 90, x1: 125, top: 30 },
      { text: "30", x0: 200, x1: 215, top: 30 },
      { text: "New", x0: 400, x1: 425, top: 30 },
      { text: "York", x0: 430, x1: 460, top: 30 },
      { text: "Bob", x0: 10, x1: 35, top: 50 },
      { text: "James", x0: 40, x1: 75, top: 50 },
      { text: "Lee", x0: 80, x1: 105, top: 50 },
      { text: "25", x0: 200, x1: 215, top: 50 },
      { text: "Los", x0: 400, x1: 425, top: 50 },
      { text: "Angeles", x0: 430, x1: 480, top: 50 },
    ];

    expect(detectTables(words, { pageWidth: 600 })).toEqual([
      {
        kind: "table",
        rows: [
          ["Full Name", "Age (years)", "Home City"],
          ["Alice Marie Smith", "30", "New York"],
          ["Bob James Lee", "25", "Los Angeles"],
        ],
      },
    ]);
  });

  it("finds a table of short cells", () => {
    expect(detectTables(INVENTORY, { pageWidth: 600 })).toEqual([
      { kind: "table", rows: INVENTORY_ROWS },
    ]);
  });

  it("keeps unaligned lines around the table", () => {
    const words = [{ text: "Inventory", x0: 10, x1: 80, top: 0 }, ...INVENTORY];
    expect(detectTables(words, { pageWidth: 600 })).toEqual([
      { kind: "line", text: "Inventory" },
      { kind: "table", rows: INVENTORY_ROWS },
    ]);
  });

  it("returns null for paragraph text", () => {
    const sentence =
      "This is a long paragraph of text that spans the entire width of the page and contains many words";
    const words: PositionedWord[] = [];
    for (const top of [10, 30]) {
      let x = 10;
      for (const word of sentence.split(" ")) {
        words.push({ text: word, x0: x, x1: x + word.length * 8, top });
        x += word.length * 8 + 5;
      }
    }
    expect(detectTables(words, { pageWidth: 800 })).toBeNull();
  });

  it("returns null for empty input", () => {
    expect(detectTables([], { pageWidth: 600 })).toBeNull();
  });

  it("returns null past the column limit", () => {
    const words: PositionedWord[] = [];
    for (let row = 0; row < 5; row++) {
      for (let col = 0; col < 10; col++) {
        words.push({ text: `c${col}`, x0: col * 100, x1: col * 100 + 20, top: row * 20 });
      }
    }
    expect(detectTables(words, { pageWidth: 1000, maxColumns: 8 })).toBeNull();
  });
});
