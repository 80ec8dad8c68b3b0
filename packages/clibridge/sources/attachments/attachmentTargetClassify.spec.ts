import { describe, expect, it } from "vitest";

import { attachmentTargetClassify } from "./attachmentTargetClassify.js";

describe("attachmentTargetClassify", () => {
    it("treats http and https prefixes as remote", () => {
        expect(attachmentTargetClassify("http://example.com/file.png")).toBe("remote");
        expect(attachmentTargetClassify("https://example.com/file.png")).toBe("remote");
    });

    it("treats paths and other schemes as local", () => {
        expect(attachmentTargetClassify("/tmp/file.png")).toBe("local");
        expect(attachmentTargetClassify("~/file.png")).toBe("local");
        expect(attachmentTargetClassify("./file.png")).toBe("local");
        expect(attachmentTargetClassify("ftp://example.com/file.png")).toBe("local");
        expect(attachmentTargetClassify("HTTPS://example.com/file.png")).toBe("local");
    });
});
