import { FrameBuffer } from "../src/id3-parser/frame-buffer";
import { FrameAllocationError } from "../src/id3-parser/errors";

function allocate(size: number, maxSize = 1024): FrameBuffer {
  const result = FrameBuffer.allocate({ id: "TIT2", size, flags: 0 }, maxSize);
  if (result instanceof FrameAllocationError) {
    throw result;
  }
  return result;
}

describe("FrameBuffer", () => {
  describe("allocate", () => {
    it("should return an allocation error for frames above the maximum size", () => {
      const result = FrameBuffer.allocate({ id: "APIC", size: 9, flags: 0 }, 8);

      expect(result).toBeInstanceOf(FrameAllocationError);
      expect(result).toMatchObject({
        frameId: "APIC",
        frameSize: 9,
        message: "Cannot allocate 9 bytes for frame APIC",
      });
    });

    it("should allocate frames of exactly the maximum size", () => {
      const frame = allocate(8, 8);

      expect(frame.remaining).toBe(8);
      expect(frame.isComplete).toBe(false);
    });
  });

  describe("write", () => {
    it("should copy bytes across several writes", () => {
      const frame = allocate(4);

      expect(frame.write(Buffer.from([0xaa, 0x01, 0x02]), 1, 10)).toBe(2);
      expect(frame.remaining).toBe(2);
      expect(frame.write(Buffer.from([0x03, 0x04, 0x05]), 0, 10)).toBe(2);
      expect(frame.isComplete).toBe(true);

      const seen: Buffer[] = [];
      frame.lend((payload) => seen.push(Buffer.from(payload)));
      expect(seen).toEqual([Buffer.from([0x01, 0x02, 0x03, 0x04])]);
    });

    it("should copy no more than maxBytes", () => {
      const frame = allocate(4);

      expect(frame.write(Buffer.from([0x01, 0x02, 0x03]), 0, 1)).toBe(1);
      expect(frame.remaining).toBe(3);
    });
  });

  describe("lend", () => {
    it("should release the payload after the borrower returns", () => {
      const frame = allocate(1);
      frame.write(Buffer.from([0x01]), 0, 1);
      const borrower = jest.fn();

      frame.lend(borrower);
      frame.lend(borrower);

      expect(borrower).toHaveBeenCalledTimes(1);
      expect(frame.isReleased).toBe(true);
      expect(frame.remaining).toBe(0);
    });

    it("should release the payload when the borrower throws", () => {
      const frame = allocate(1);
      frame.write(Buffer.from([0x01]), 0, 1);

      expect(() =>
        frame.lend(() => {
          throw new Error("borrower failed");
        }),
      ).toThrow("borrower failed");
      expect(frame.isReleased).toBe(true);
    });

    it("should not lend an incomplete payload", () => {
      const frame = allocate(2);
      frame.write(Buffer.from([0x01]), 0, 1);
      const borrower = jest.fn();

      frame.lend(borrower);

      expect(borrower).not.toHaveBeenCalled();
      expect(frame.isReleased).toBe(false);
    });
  });

  describe("release", () => {
    it("should be idempotent", () => {
      const frame = allocate(2);

      frame.release();
      frame.release();

      expect(frame.isReleased).toBe(true);
      expect(frame.write(Buffer.from([0x01]), 0, 1)).toBe(0);
    });
  });
});
