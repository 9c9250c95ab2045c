// Simple deterministic PRNG (Mulberry32) and helpers
export class PRNG {
  private state: number;
  constructor(seed: number) {
    // Force to uint32
    this.state = seed >>> 0;
    if (this.state === 0) {
      // avoid zero seed degeneracy
      this.state = 0x6d2b79f5;
    }
  }
  // Wrap an external [0,1) source; every helper below draws through next()
  static fromSource(source: () => number): PRNG {
    const rng = new PRNG(0);
    rng.next = source;
    return rng;
  }
  // Returns a float in [0,1)
  next = () => {
    let t = (this.state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
  // Float in [min, max)
  float(min = 0, max = 1): number {
    return min + (max - min) * this.next();
  }
  // Integer in [min, max] inclusive
  int(min: number, max: number): number {
    return Math.floor(this.float(min, max + 1));
  }
  // Independent child stream seeded from one draw of this one
  fork(): PRNG {
    return new PRNG(Math.floor(this.next() * 4294967296));
  }
}
