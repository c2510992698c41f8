/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
declare module 'bufio' {
  class StaticWriter {
    render(): Buffer
    writeU8(value: number): StaticWriter
    writeU64(value: number): StaticWriter
    writeDouble(value: number): StaticWriter
    writeVarint(value: number): StaticWriter
    writeVarString(value: string, enc: BufferEncoding | null): StaticWriter
    writeVarBytes(value: Buffer): StaticWriter
    writeBytes(value: Buffer): StaticWriter
  }

  class BufferWriter {
    render(): Buffer
    writeU8(value: number): BufferWriter
    writeU64(value: number): BufferWriter
    writeDouble(value: number): BufferWriter
    writeVarint(value: number): BufferWriter
    writeVarString(value: string, enc: BufferEncoding | null): BufferWriter
    writeVarBytes(value: Buffer): BufferWriter
    writeBytes(value: Buffer): BufferWriter
  }

  export function write(size: number): StaticWriter
  export function write(): BufferWriter
}
