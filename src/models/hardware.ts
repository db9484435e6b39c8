/**
 * Attached hardware reported by the SK8.
 */
export interface HardwareFlags {
  /** Raw hardware state byte */
  raw: number;

  /** External IMU chain attached */
  imus: boolean;

  /** SK8-ExtAna board attached */
  extAna: boolean;
}
