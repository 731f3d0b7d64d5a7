/**
 * Thrown when a ray direction cannot be normalized because its length is
 * (close to) zero.
 */
export class InvalidRayError extends RangeError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRayError';
  }
}

/**
 * Thrown at render entry (or at primitive construction) when the scene,
 * camera or image parameters are unusable: non-positive sizes, a field of
 * view outside (0, 180), non-finite coordinates, and so on.
 */
export class InvalidConfigurationError extends RangeError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidConfigurationError';
  }
}

/** Throw unless every component of `v` is a finite number. */
export function assertFiniteVec3(owner: string, label: string, v: ArrayLike<number>): void {
  if (v.length !== 3) {
    throw new InvalidConfigurationError(`${owner}: ${label} must have 3 components, got ${v.length}`);
  }
  for (let i = 0; i < 3; i++) {
    if (!Number.isFinite(v[i])) {
      throw new InvalidConfigurationError(`${owner}: ${label}[${i}] must be finite, got ${v[i]}`);
    }
  }
}
