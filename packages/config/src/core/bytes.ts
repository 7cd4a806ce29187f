const encoder = new TextEncoder()
const decoder = new TextDecoder()

export function textToBytes(text: string): Uint8Array {
  return encoder.encode(text)
}

export function bytesToText(bytes: Uint8Array): string {
  return decoder.decode(bytes)
}
