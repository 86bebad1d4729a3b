/**
 * CORSIKA particle IDs -> KASCADE particle IDs
 */
export const PARTICLE_MAP: ReadonlyMap<number, number> = new Map([
  [1, 1], // gamma
  [2, 2], // e+
  [3, 3], // e-
  [5, 4], // mu+
  [6, 5], // mu-
  [7, 6], // pi0
  [8, 7], // pi+
  [9, 8], // pi-
  [11, 9], // K+
  [12, 10], // K-
  [10, 11], // K0 long
  [16, 12], // K0 short
  [14, 13], // proton
  [13, 14], // neutron
]);

export const ParticleMap = {
  /**
   * KASCADE ID for a CORSIKA ID, or undefined when the particle has none
   */
  lookup(corsikaId: number): number | undefined {
    return PARTICLE_MAP.get(corsikaId);
  },
};
