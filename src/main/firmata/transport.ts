/**
 * What the board needs from whatever carries its bytes: ordered, reliable
 * reads of an exact length and writes of a whole buffer. Failures surface as
 * rejected promises; the board reports any of them as an IOError.
 */
export interface Transport {
  read(length: number): Promise<Buffer>;
  write(data: Buffer): Promise<number>;
  close?(): Promise<void>;
}
