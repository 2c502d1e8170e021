import { describe, it, expect } from "@jest/globals";
import {
  decodeAscii,
  decodeBlock,
  decodeFirmware,
  registerMap,
} from "@/lib/transports/modbus/register-decoder";

function ascii(text: string): number[] {
  const words: number[] = [];
  for (let i = 0; i < text.length; i += 2) {
    words.push(text.charCodeAt(i) | ((text.charCodeAt(i + 1) || 0) << 8));
  }
  return words;
}

describe("register decoder", () => {
  it("should decode unsigned, signed and split-byte runtime registers", () => {
    const words = new Array<number>(67).fill(0);
    words[0] = 3;
    words[5] = 0x6457; // SOH 100, SOC 87
    words[12] = 2417;
    words[15] = 5998;
    words[64] = 0xfff6;

    const fields = decodeBlock(words, registerMap.inputBlocks.runtime);

    expect(fields.state).toBe(3);
    expect(fields.soc).toBe(87);
    expect(fields.soh).toBe(100);
    expect(fields.vacr).toBe(2417);
    expect(fields.fac).toBe(5998);
    expect(fields.tinner).toBe(-10);
  });

  it("should sum string registers and 32-bit totals", () => {
    const words = new Array<number>(60).fill(0);
    words[28] = 10;
    words[29] = 20;
    words[30] = 30;
    words[40] = 100;
    words[41] = 1;
    words[42] = 5;
    words[44] = 7;

    const fields = decodeBlock(words, registerMap.inputBlocks.energy);

    expect(fields.epvday).toBe(60);
    expect(fields.epvall).toBe(65648);
  });

  it("should leave out fields past the end of a short read", () => {
    const fields = decodeBlock([1, 2, 3], registerMap.inputBlocks.runtime);

    expect(fields).toEqual({ state: 1, vpv1: 2, vpv2: 3 });
  });

  it("should decode ASCII serial numbers low byte first", () => {
    expect(decodeAscii(ascii("4512670118"))).toBe("4512670118");
    expect(decodeAscii([...ascii("AB12"), 0])).toBe("AB12");
  });

  it("should decode firmware codes", () => {
    expect(decodeFirmware([...ascii("FAAB"), 0x25, 0x25])).toBe("FAAB-2525");
    expect(decodeFirmware([0, 0, 0x25, 0x25])).toBe("");
    expect(decodeFirmware([1, 2])).toBe("");
  });
});
