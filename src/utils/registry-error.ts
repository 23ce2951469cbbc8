/**
 * Raised when a registry is used outside its contract
 * (assignment after the barrier, a second publish for the same document, ...)
 */
export class RegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RegistryError";
  }
}
