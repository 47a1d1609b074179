/** A 3×2 RGB PNG. */
export const PNG_BYTES = Buffer.from(
  "iVBORw0KGgoAAAANSUhEUgAAAAMAAAACCAIAAAASFvFNAAAAEElEQVR4nGNQaDgAQQxwFgBO1AhBM32XQgAAAABJRU5ErkJggg==",
  "base64",
);

/** A 4×5 GIF. */
export const GIF_BYTES = Buffer.from("R0lGODlhBAAFAIAAAAAAAP///ywAAAAABAAFAAACAkQBADs=", "base64");

/** Start of a JPEG stream with a baseline frame header declaring 640×480. */
export const JPEG_HEADER = Buffer.from([
  0xff, 0xd8,
  0xff, 0xe0, 0x00, 0x10, 0x4a, 0x46, 0x49, 0x46, 0x00, 0x01, 0x01, 0x00, 0x00, 0x01, 0x00, 0x01, 0x00, 0x00,
  0xff, 0xc0, 0x00, 0x11, 0x08, 0x01, 0xe0, 0x02, 0x80, 0x03, 0x01, 0x22, 0x00, 0x02, 0x11, 0x01, 0x03, 0x11, 0x01,
]);

export function utf8(value: string): Buffer {
  return Buffer.from(value, "utf-8");
}
