/**
 * Reads all of stdin as UTF-8. An interactive terminal counts as no input.
 */
export async function readProcessStdin(): Promise<string> {
  if (process.stdin.isTTY) {
    return '';
  }

  process.stdin.setEncoding('utf8');
  let text = '';
  for await (const chunk of process.stdin) {
    text += String(chunk);
  }
  return text;
}
