/** Renders a value of a registered type to bytes (used when dumping documents). */
export type Marshaler<T> = (value: T) => Uint8Array

/** Builds a value of a registered type from raw bytes. Throw to reject the input. */
export type Unmarshaler<T> = (data: Uint8Array) => T

/**
 * Capability of a class that can rebuild itself from text.
 *
 * Fields declared with `textual(Class)` are decoded by calling `unmarshalText`
 * on the value already in the record, or on a fresh `new Class()`.
 */
export interface TextUnmarshaler {
  unmarshalText(text: Uint8Array): void
}

export interface TextMarshaler {
  marshalText(): Uint8Array
}

export type TextCodec<T extends TextUnmarshaler = TextUnmarshaler> = new () => T
