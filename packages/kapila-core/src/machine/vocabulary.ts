/**
 * Kannada vocabulary - words bound to primitive operations
 *
 * Each entry maps a Kannada word to the canonical name of a primitive.
 */

const wordTable: Record<string, string> = {
  'ಕೂಡು': 'add',
  'ಕೂಡಿಸು': 'add',
  'ಕಳೆ': 'sub',
  'ಕಳೆಯಿರಿ': 'sub',
  'ಗುಣಿಸು': 'mul',
  'ಗುಣಾಕಾರ': 'mul',
  'ಭಾಗಿಸು': 'div',
  'ಭಾಗಾಕಾರ': 'div',
  'ಶೇಷ': 'mod',
  'ಸಮ': 'equal',
  'ಸಮನಲ್ಲ': 'not-equal',
  'ಕಿರಿದು': 'less',
  'ಹಿರಿದು': 'greater',
  'ಕಿರಿದುಸಮ': 'less-equal',
  'ಹಿರಿದುಸಮ': 'greater-equal',
  'ನಿಜ': 'true',
  'ಸರಿ': 'true',
  'ಹೌದು': 'true',
  'ಸುಳ್ಳು': 'false',
  'ತಪ್ಪು': 'false',
  'ಬೇಸ': 'false',
  'ಇಲ್ಲ': 'false',
  'ಮತ್ತು': 'and',
  'ಅಥವಾ': 'or',
  'ಅಲ್ಲ': 'not',
  'ನಕಲು': 'dup',
  'ಬಿಡು': 'drop',
  'ಅದಲುಬದಲು': 'swap',
  'ಮೇಲೆ': 'over',
  'ತಿರುಗಿಸು': 'rot',
  'ಮುದ್ರಿಸು': 'print',
  'ಓದು': 'read-file',
  'ಬರೆ': 'write-file',
  'ಉದ್ದ': 'length',
  'ತೆಗೆ': 'index',
  'ಸೇರಿಸು': 'list-push',
  'ಮೊದಲ': 'first',
  'ಉಳಿದ': 'rest',
  'ಜೋಡಿಸು': 'concatenate',
};

export const VOCABULARY: ReadonlyMap<string, string> = new Map(Object.entries(wordTable));

/**
 * Canonical primitive name for a vocabulary word, or undefined
 */
export function vocabularyTarget(word: string): string | undefined {
  return VOCABULARY.get(word);
}

/** Every word bound to `primitive` */
export function wordsFor(primitive: string): string[] {
  const words: string[] = [];
  for (const [word, target] of VOCABULARY) {
    if (target === primitive) words.push(word);
  }
  return words;
}
