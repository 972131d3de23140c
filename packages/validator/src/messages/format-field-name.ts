/**
 * `userType` -> `user type`. A space goes before every uppercase letter
 * except a leading one, and the result is lowercased.
 */
export function formatFieldName(label: string): string {
  let text = '';
  for (const char of label) {
    const lower = char.toLowerCase();
    if (char !== lower) {
      if (text.length > 0) {
        text += ' ';
      }
      text += lower;
    } else {
      text += char;
    }
  }
  return text;
}
