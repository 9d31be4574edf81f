import clipboardy from 'clipboardy'

export interface Clipboard {
  read(): Promise<string>
  write(text: string): Promise<void>
}

export const systemClipboard: Clipboard = {
  read: () => clipboardy.read(),
  write: (text) => clipboardy.write(text),
}
