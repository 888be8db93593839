import { describe, expect, it } from "vitest";
import { formatTarget, parseRepoTarget, sameTarget, targetKey } from "../targets.js";

describe("parseRepoTarget", () => {
  it("parses owner/name as the default branch", () => {
    expect(parseRepoTarget("acme/widgets")).toEqual({
      ok: true,
      target: { repo: "acme/widgets", branch: null },
    });
  });

  it("parses owner/name:branch", () => {
    expect(parseRepoTarget(" acme/widgets:release/2.x ")).toEqual({
      ok: true,
      target: { repo: "acme/widgets", branch: "release/2.x" },
    });
  });

  it("accepts dots, dashes and underscores in the name", () => {
    expect(parseRepoTarget("acme-labs/widget_kit.js").ok).toBe(true);
  });

  it.each(["acme", "/widgets", "acme/", "-acme/widgets", "acme/widgets/extra", "acme/widgets.git"])(
    "rejects %s",
    (spec) => {
      expect(parseRepoTarget(spec)).toEqual({
        ok: false,
        error: `"${spec}" is not a repository of the form owner/name`,
      });
    },
  );

  it.each(["acme/widgets:", "acme/widgets:a..b", "acme/widgets:feature branch", "acme/widgets:/main"])(
    "rejects the branch in %s",
    (spec) => {
      expect(parseRepoTarget(spec)).toEqual({
        ok: false,
        error: `"${spec}" has an invalid branch name`,
      });
    },
  );
});

describe("target helpers", () => {
  const main = { repo: "acme/widgets", branch: null };
  const dev = { repo: "acme/widgets", branch: "develop" };

  it("formats targets for display", () => {
    expect(formatTarget(main)).toBe("acme/widgets");
    expect(formatTarget(dev)).toBe("acme/widgets:develop");
  });

  it("derives distinct keys per branch", () => {
    expect(targetKey(main)).toBe("acme/widgets");
    expect(targetKey(dev)).toBe("acme/widgets#develop");
  });

  it("compares repository and branch", () => {
    expect(sameTarget(main, { repo: "acme/widgets", branch: null })).toBe(true);
    expect(sameTarget(main, dev)).toBe(false);
  });
});
