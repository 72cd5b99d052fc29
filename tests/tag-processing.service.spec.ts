import { Test, TestingModule } from "@nestjs/testing";
import { Logger } from "@nestjs/common";
import { TagProcessingService } from "../src/tag-upload/tag-processing.service";
import { FileStorageService } from "../src/file-storage/file-storage.service";
import { TagNotFoundError } from "../src/tag-upload/errors";
import { UploadError } from "../src/file-storage/errors";
import { TagReadResult } from "../src/id3-parser/types";
import { AttachedPicture } from "../src/id3-parser/attached-picture";
import { TextEncoding } from "../src/id3-parser/consts";

describe("TagProcessingService", () => {
  let service: TagProcessingService;
  let fileStorageService: jest.Mocked<FileStorageService>;

  const front: AttachedPicture = {
    frameId: "APIC",
    encoding: TextEncoding.Latin1,
    mimeType: "image/jpeg",
    pictureType: 3,
    pictureTypeName: "Cover (front)",
    description: "front",
    data: Buffer.from([0xff, 0xd8, 0xff, 0xe0]),
  };

  const back: AttachedPicture = {
    frameId: "APIC",
    encoding: TextEncoding.Utf8,
    mimeType: "image/png",
    pictureType: 4,
    pictureTypeName: "Cover (back)",
    description: "back",
    data: Buffer.from([0x89, 0x50]),
  };

  function tagWith(overrides: Partial<TagReadResult>): TagReadResult {
    return {
      header: { version: 3, revision: 0, flags: 0, tagSize: 512 },
      complete: true,
      frames: [
        { id: "TIT2", size: 10 },
        { id: "APIC", size: 21 },
        { id: "APIC", size: 18 },
      ],
      pictures: [front, back],
      ...overrides,
    };
  }

  beforeEach(async () => {
    fileStorageService = {
      storePicture: jest.fn<Promise<string>, [Buffer, string]>(),
    } as unknown as jest.Mocked<FileStorageService>;

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TagProcessingService,
        {
          provide: FileStorageService,
          useValue: fileStorageService,
        },
      ],
    }).compile();

    service = module.get<TagProcessingService>(TagProcessingService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("processTag", () => {
    it("should store every picture and return its key", async () => {
      fileStorageService.storePicture
        .mockResolvedValueOnce("id3-pictures/front.jpg")
        .mockResolvedValueOnce("id3-pictures/back.png");

      const result = await service.processTag(tagWith({}));

      expect(result).toEqual({
        header: { version: 3, revision: 0, flags: 0, tagSize: 512 },
        complete: true,
        frames: [
          { id: "TIT2", size: 10 },
          { id: "APIC", size: 21 },
          { id: "APIC", size: 18 },
        ],
        pictures: [
          {
            frameId: "APIC",
            mimeType: "image/jpeg",
            pictureType: 3,
            pictureTypeName: "Cover (front)",
            description: "front",
            size: 4,
            key: "id3-pictures/front.jpg",
          },
          {
            frameId: "APIC",
            mimeType: "image/png",
            pictureType: 4,
            pictureTypeName: "Cover (back)",
            description: "back",
            size: 2,
            key: "id3-pictures/back.png",
          },
        ],
      });
      expect(fileStorageService.storePicture).toHaveBeenNthCalledWith(
        1,
        front.data,
        "image/jpeg",
      );
      expect(fileStorageService.storePicture).toHaveBeenNthCalledWith(
        2,
        back.data,
        "image/png",
      );
    });

    it("should throw TagNotFoundError when the file has no tag", async () => {
      await expect(
        service.processTag(tagWith({ header: null, frames: [], pictures: [] })),
      ).rejects.toThrow(TagNotFoundError);
      expect(fileStorageService.storePicture).not.toHaveBeenCalled();
    });

    it("should warn about a truncated tag and still return it", async () => {
      const warn = jest.spyOn(Logger.prototype, "warn").mockImplementation();

      const result = await service.processTag(
        tagWith({ complete: false, frames: [{ id: "TIT2", size: 10 }], pictures: [] }),
      );

      expect(result.complete).toBe(false);
      expect(result.pictures).toEqual([]);
      expect(warn).toHaveBeenCalledWith("Tag ended early: 1 complete frames read");
    });

    it("should stop at the first picture that cannot be stored", async () => {
      const storageError = new UploadError("Failed to store picture: Access Denied");
      fileStorageService.storePicture.mockRejectedValueOnce(storageError);

      await expect(service.processTag(tagWith({}))).rejects.toBe(storageError);
      expect(fileStorageService.storePicture).toHaveBeenCalledTimes(1);
    });
  });
});
