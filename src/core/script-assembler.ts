/**
 * Append-only SQL script writer. Fragments land in the order they are
 * appended, byte for byte.
 */
import { createReadStream, createWriteStream } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { pipeline } from 'node:stream/promises';

export class ScriptAssembler {
  readonly outputPath: string;
  private started = false;
  private fragments = 0;
  private bytes = 0;

  constructor(outputPath: string) {
    this.outputPath = outputPath;
  }

  /**
   * Create or truncate the output file.
   */
  async begin(): Promise<void> {
    await mkdir(dirname(this.outputPath), { recursive: true });
    await writeFile(this.outputPath, '', 'utf8');
    this.started = true;
  }

  /**
   * Stream the contents of `fragmentPath` onto the end of the script.
   * Returns the number of bytes appended.
   */
  async appendFile(fragmentPath: string): Promise<number> {
    if (!this.started) {
      throw new Error('ScriptAssembler.begin() must be called before appendFile()');
    }
    const out = createWriteStream(this.outputPath, { flags: 'a' });
    await pipeline(createReadStream(fragmentPath), out);
    this.fragments++;
    this.bytes += out.bytesWritten;
    return out.bytesWritten;
  }

  get fragmentCount(): number {
    return this.fragments;
  }

  get byteCount(): number {
    return this.bytes;
  }
}
