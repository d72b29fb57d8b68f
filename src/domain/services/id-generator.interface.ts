/**
 * Injection token for the id generator.
 * Used for dependency inversion (DIP).
 */
export const ID_GENERATOR = Symbol('ID_GENERATOR');

/**
 * Produces unique identifiers for new airlines.
 * Tests substitute a deterministic sequence.
 */
export interface IdGenerator {
  generate(): string;
}
