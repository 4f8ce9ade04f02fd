import type { RegisterContent, RegisterType } from "./types.js";

/**
 * The unnamed register: a single slot overwritten by yank and delete,
 * read (never cleared) by paste.
 */
export class Register {
  private content: RegisterContent | null = null;

  /**
   * Store text after a yank or an operator delete.
   */
  store(text: string, type: RegisterType): void {
    this.content = { text, type };
  }

  /**
   * Get the register content, or null when nothing pasteable is stored.
   */
  get(): RegisterContent | null {
    if (!this.content || this.content.text === "") return null;
    return { ...this.content };
  }
}
