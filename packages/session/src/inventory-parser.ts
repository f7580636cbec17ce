/**
 * Turns an engine item descriptor into a short display name.
 *
 * Descriptors follow the engine's object-dump shape, e.g.
 * `"Obj160: brass lantern Parent4 Sibling0 Child0"`. This is string sniffing
 * over an undocumented format; descriptors that match none of the shapes come
 * back trimmed but otherwise unchanged.
 */
export function parseItemName(descriptor: string): string {
  const parentIdx = descriptor.toLowerCase().indexOf("parent");
  if (parentIdx !== -1) {
    const head = descriptor.slice(0, parentIdx).trim();
    return afterFirstColon(head) ?? head;
  }
  return afterFirstColon(descriptor) ?? descriptor.trim();
}

function afterFirstColon(text: string): string | undefined {
  const colon = text.indexOf(":");
  if (colon === -1) return undefined;
  return text.slice(colon + 1).trim();
}
