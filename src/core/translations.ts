/**
 * Error message translation
 *
 * Some API errors come back as bare message keys. When translation is enabled
 * on the session, known keys are swapped for readable text.
 */

const ERROR_TRANSLATIONS: Readonly<Record<string, string>> = {
  "page.post.error.attachment_bad_extension":
    "The attachment does not have an extension permitted in Community Admin > System > File Attachments",
};

/**
 * Cuts a message at its first line break.
 */
export function parseMessage(message: string): string {
  const index = message.search(/[\r\n]/);
  return index === -1 ? message : message.slice(0, index);
}

export class ErrorTranslator {
  private readonly table: Map<string, string>;

  constructor(extra: Record<string, string> = {}) {
    this.table = new Map(Object.entries({ ...ERROR_TRANSLATIONS, ...extra }));
  }

  /**
   * Returns the readable form of a message, or the first line of the message
   * when no translation exists.
   */
  translate(message: string): string {
    const signature = parseMessage(message);
    return this.table.get(signature) ?? signature;
  }
}

export const defaultTranslator = new ErrorTranslator();
