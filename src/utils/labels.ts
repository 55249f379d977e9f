const UNSAFE_CHARS_RE = /[\/\\:*?"<>|\u0000-\u001f]+/g;
const MAX_NAME_LENGTH = 120;

export function sanitizeLabel(raw: string): string {
  const cleaned = raw
    .replace(UNSAFE_CHARS_RE, '_')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/^\.+/, '')
    .slice(0, MAX_NAME_LENGTH)
    .trim();
  return cleaned || 'region';
}

/**
 * Maps labels to file names in order. Repeated names (compared
 * case-insensitively) get -2, -3, ... appended.
 */
export function assignFileNames(
  labels: string[],
  ext = 'png',
  onDuplicate?: (label: string, fileName: string) => void,
): string[] {
  const taken = new Set<string>();
  return labels.map((label) => {
    const base = sanitizeLabel(label);
    let name = `${base}.${ext}`;
    for (let n = 2; taken.has(name.toLowerCase()); n++) {
      name = `${base}-${n}.${ext}`;
    }
    if (name !== `${base}.${ext}`) onDuplicate?.(label, name);
    taken.add(name.toLowerCase());
    return name;
  });
}
