/**
 * Import a module at runtime
 *
 * @param specifier Bare package specifier or `file:` URL
 */
export async function importModule(specifier: string): Promise<unknown> {
  return import(specifier);
}
