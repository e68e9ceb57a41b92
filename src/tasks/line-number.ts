/** 1-based line number of the character at `offset`. */
export function lineNumberAt(content: string, offset: number): number {
  let line = 1;
  for (let i = 0; i < offset && i < content.length; i++) {
    if (content.charCodeAt(i) === 0x0a) line++;
  }
  return line;
}
