import { mat4, vec3 } from "gl-matrix";
import { describe, expect, it } from "vitest";

import {
  UniformBlockData,
  blockTag,
  describeMember,
  std140Block,
  type BlockFields,
} from "../../src/gpu/std140";

describe("gpu/std140", () => {
  describe("std140Block", () => {
    it("pads vec3 to a 16-byte boundary and rounds the block up", () => {
      const block = std140Block("Globals", { scale: "float", tint: "vec3" });

      expect(block.members.map((m) => [m.name, m.byteOffset, m.byteSize])).toEqual([
        ["scale", 0, 4],
        ["tint", 16, 12],
      ]);
      expect(block.byteSize).toBe(32);
    });

    it("packs scalars after vec2 and into the tail of vec3", () => {
      const block = std140Block("Mixed", { a: "vec2", b: "float", c: "vec3", d: "float" });

      expect(block.members.map((m) => m.byteOffset)).toEqual([0, 8, 16, 28]);
      expect(block.byteSize).toBe(32);
    });

    it("gives scalar arrays a 16-byte stride", () => {
      const block = std140Block("Weights", { weights: { type: "float", length: 3 } });

      expect(block.members[0]).toEqual({
        name: "weights",
        type: "float",
        byteOffset: 0,
        byteSize: 48,
        arrayLength: 3,
        arrayStride: 16,
        matrixStride: 0,
      });
      expect(block.byteSize).toBe(48);
    });

    it("lays out matrices as 16-byte columns", () => {
      const block = std140Block("Transforms", {
        flag: "float",
        normal: "mat3",
        bones: { type: "mat2", length: 2 },
      });

      expect(block.members.map((m) => [m.byteOffset, m.byteSize, m.arrayStride, m.matrixStride])).toEqual([
        [0, 4, 0, 0],
        [16, 48, 0, 16],
        [64, 64, 32, 16],
      ]);
      expect(block.byteSize).toBe(128);
    });

    it("rejects non-positive array lengths", () => {
      expect(() => std140Block("Bad", { xs: { type: "vec4", length: 0 } })).toThrow(RangeError);
    });
  });

  describe("tags", () => {
    it("describes members with strides", () => {
      const block = std140Block("B", { model: "mat4", weights: { type: "float", length: 2 } });

      expect(describeMember(block.members[0])).toBe("model:mat4m16@0+64");
      expect(describeMember(block.members[1])).toBe("weights:float[2]/16@64+32");
    });

    it("leaves the block name out of the tag", () => {
      const a = std140Block("Globals", { scale: "float" });
      const b = std140Block("Settings", { scale: "float" });

      expect(blockTag(a)).toBe("block(16){scale:float@0+4}");
      expect(blockTag(b)).toBe(blockTag(a));
    });
  });

  describe("UniformBlockData", () => {
    it("writes floats at their std140 offsets", () => {
      const block = std140Block("Globals", { scale: "float", tint: "vec3" });
      const data = new UniformBlockData(block).set("scale", 2).set("tint", [1, 0.5, 0.25]);
      const view = new DataView(data.bytes.buffer);

      expect(data.bytes.byteLength).toBe(32);
      expect(view.getFloat32(0, true)).toBe(2);
      expect(view.getFloat32(16, true)).toBe(1);
      expect(view.getFloat32(20, true)).toBe(0.5);
      expect(view.getFloat32(24, true)).toBe(0.25);
    });

    it("writes integers and booleans as 32-bit values", () => {
      const block = std140Block("Flags", { count: "int", enabled: "bool" });
      const data = new UniformBlockData(block).set("count", -3).set("enabled", true);
      const view = new DataView(data.bytes.buffer);

      expect(view.getInt32(0, true)).toBe(-3);
      expect(view.getUint32(4, true)).toBe(1);
    });

    it("strides array elements and matrix columns", () => {
      const block = std140Block("Arrays", { weights: { type: "float", length: 3 }, rotation: "mat2" });
      const data = new UniformBlockData(block).set("weights", [1, 2, 3]).set("rotation", [5, 6, 7, 8]);
      const view = new DataView(data.bytes.buffer);

      expect([0, 16, 32].map((o) => view.getFloat32(o, true))).toEqual([1, 2, 3]);
      expect([48, 52, 64, 68].map((o) => view.getFloat32(o, true))).toEqual([5, 6, 7, 8]);
    });

    it("takes gl-matrix vectors and matrices", () => {
      const block = std140Block("Camera", { eye: "vec3", view: "mat4" });
      const view = mat4.fromTranslation(mat4.create(), [2, 3, 4]);
      const data = new UniformBlockData(block).set("eye", vec3.fromValues(1, 0.5, 0.25)).set("view", view);
      const floats = new Float32Array(data.bytes.buffer);

      expect(block.byteSize).toBe(80);
      expect(Array.from(floats.subarray(0, 3))).toEqual([1, 0.5, 0.25]);
      expect(Array.from(floats.subarray(4, 20))).toEqual([1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 2, 3, 4, 1]);
    });

    it("takes any typed array", () => {
      const block = std140Block("Counts", { ids: "ivec4", mask: "uvec2" });
      const data = new UniformBlockData(block)
        .set("ids", Int16Array.of(-1, 2, -3, 4))
        .set("mask", Uint8Array.of(7, 255));
      const view = new DataView(data.bytes.buffer);

      expect([0, 4, 8, 12].map((o) => view.getInt32(o, true))).toEqual([-1, 2, -3, 4]);
      expect([16, 20].map((o) => view.getUint32(o, true))).toEqual([7, 255]);
    });

    it("rejects the wrong component count", () => {
      const block = std140Block("Globals", { scale: "float", tint: "vec3" });
      const data = new UniformBlockData<BlockFields>(block);

      expect(() => data.set("tint", [1, 2])).toThrow("Member 'tint' (vec3) takes 3 components, got 2");
    });

    it("rejects unknown members", () => {
      const block = std140Block("Globals", { scale: "float" });
      const data = new UniformBlockData<BlockFields>(block);

      expect(() => data.set("missing", 1)).toThrow("Block 'Globals' has no member 'missing'");
    });
  });
});
