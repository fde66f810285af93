import { attachmentDisposition, sanitizeFilename } from "../filename";
import { BadRequestError } from "../../errors/app-error";

describe("sanitizeFilename", () => {
  // ─── accepted names ───────────────────────────────────────────────

  describe("accepted names", () => {
    it.each([
      ["report.txt", "report.txt"],
      ["archive.tar.gz", "archive.tar.gz"],
      [".env", ".env"],
      ["my file (1).pdf", "my file (1).pdf"],
      ["résumé.docx", "résumé.docx"],
      ["...", "..."],
    ])("should keep %s as %s", (raw, expected) => {
      expect(sanitizeFilename(raw)).toBe(expected);
    });

    it.each([
      ["dir/b.txt", "b.txt"],
      ["/abs/path/c.txt", "c.txt"],
      ["C:\\Users\\me\\d.txt", "d.txt"],
      ["mixed\\sep/e.txt", "e.txt"],
      ["./f.txt", "f.txt"],
      ["folder/", "folder"],
    ])("should reduce %s to its final component %s", (raw, expected) => {
      expect(sanitizeFilename(raw)).toBe(expected);
    });
  });

  // ─── rejected names ───────────────────────────────────────────────

  describe("rejected names", () => {
    it.each(["", ".", "..", "/", "\\", "a/.", "//"])(
      "should reject %p with BadRequestError",
      (raw) => {
        expect(() => sanitizeFilename(raw)).toThrow(BadRequestError);
      },
    );

    it.each([
      "../secret.txt",
      "../../etc/passwd",
      "docs/../../x.txt",
      "..\\windows\\win.ini",
      "a/..",
    ])("should reject traversal in %p", (raw) => {
      expect(() => sanitizeFilename(raw)).toThrow(/path traversal/);
    });

    it("should reject a NUL byte", () => {
      expect(() => sanitizeFilename("evil\0.txt")).toThrow(/NUL/);
    });

    it("should name the offending input in the message", () => {
      expect(() => sanitizeFilename("..")).toThrow('Invalid filename ".."');
    });
  });
});

describe("attachmentDisposition", () => {
  it("should quote a plain ASCII name", () => {
    expect(attachmentDisposition("report.txt")).toBe(
      "attachment; filename=\"report.txt\"; filename*=UTF-8''report.txt",
    );
  });

  it("should escape quotes and backslashes in the quoted form", () => {
    expect(attachmentDisposition('a"b\\c.txt')).toBe(
      "attachment; filename=\"a\\\"b\\\\c.txt\"; filename*=UTF-8''a%22b%5Cc.txt",
    );
  });

  it("should replace non-ASCII in the quoted form and percent-encode it in filename*", () => {
    expect(attachmentDisposition("é.txt")).toBe(
      "attachment; filename=\"_.txt\"; filename*=UTF-8''%C3%A9.txt",
    );
  });

  it("should percent-encode spaces and RFC 5987 reserved characters", () => {
    expect(attachmentDisposition("it's (1).txt")).toBe(
      "attachment; filename=\"it's (1).txt\"; filename*=UTF-8''it%27s%20%281%29.txt",
    );
  });
});
