/**
 * Length conversions between the model's millimetres and the units the
 * formats store: twips (RTF, DOCX), points (PDF, font sizes) and EMU
 * (DrawingML). 1 inch = 1440 twips = 72 pt = 914400 EMU.
 */

export const MM_PER_INCH = 25.4;
export const TWIPS_PER_INCH = 1440;
export const POINTS_PER_INCH = 72;
export const EMU_PER_INCH = 914400;
/** At 96 DPI, 1 px = 9525 EMU. */
export const EMU_PER_PX = 9525;

export function mmToTwips(mm: number): number {
  return Math.round((mm / MM_PER_INCH) * TWIPS_PER_INCH);
}

/** Rounded to a tenth of a millimetre, which absorbs the twip rounding of `mmToTwips`. */
export function twipsToMm(twips: number): number {
  return Math.round((twips / TWIPS_PER_INCH) * MM_PER_INCH * 10) / 10;
}

export function mmToPoints(mm: number): number {
  return (mm / MM_PER_INCH) * POINTS_PER_INCH;
}

export function pointsToMm(points: number): number {
  return (points / POINTS_PER_INCH) * MM_PER_INCH;
}

export function mmToEmu(mm: number): number {
  return Math.round((mm / MM_PER_INCH) * EMU_PER_INCH);
}

export function pxToEmu(px: number): number {
  return Math.round(px * EMU_PER_PX);
}
