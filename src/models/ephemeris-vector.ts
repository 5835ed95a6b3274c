/** Heliocentric, ecliptic-referenced position in astronomical units. */
export interface EphemerisVector {
  x_au: number;
  y_au: number;
  z_au: number;
}

export const ORIGIN: EphemerisVector = Object.freeze({ x_au: 0, y_au: 0, z_au: 0 });
