import { describe, it, expect } from "vitest";
import { build } from "./builder";
import { orderChapters, render, renderSummary } from "./renderer";
import { DIALECTS, Logger, Tracker } from "../utils";
import type { SummaryContext } from "../types";

const TITLE = "Summary";

function summarize(
  paths: string[],
  format: "md" | "git" = "md",
  sort?: string[],
): string {
  return render(build(TITLE, paths).root, DIALECTS[format], sort);
}

describe("render", () => {
  it("renders a single root file", () => {
    expect(summarize(["file1.md"])).toBe("# Summary\n\n- [File1](file1.md)\n");
    expect(summarize(["file1.md"], "git")).toBe(
      "# Summary\n\n* [File1](file1.md)\n",
    );
  });

  it("emits only the heading for an empty tree", () => {
    expect(summarize([])).toBe("# Summary\n\n");
    expect(render(build("", []).root, DIALECTS.md)).toBe("# \n\n");
  });

  it("uses the title verbatim", () => {
    expect(render(build("my_book", []).root, DIALECTS.md)).toBe(
      "# my_book\n\n",
    );
  });

  it("renders chapters without a README as unlinked headings", () => {
    const paths = ["file1.md", "chapter1/file1.md"];

    expect(summarize(paths, "git")).toBe(
      "# Summary\n\n* [File1](file1.md)\n* Chapter1\n    * [File1](chapter1/file1.md)\n",
    );
    expect(summarize(paths, "md")).toBe(
      "# Summary\n\n- [File1](file1.md)\n- [Chapter1](#)\n    - [File1](chapter1/file1.md)\n",
    );
  });

  it("indents subchapters by four spaces per level", () => {
    expect(
      summarize(["chapter1/file1.md", "chapter1/subchap/file1.md"], "git"),
    ).toBe(
      "# Summary\n\n" +
        "* Chapter1\n" +
        "    * [File1](chapter1/file1.md)\n" +
        "    * Subchap\n" +
        "        * [File1](chapter1/subchap/file1.md)\n",
    );
  });

  it("links chapter headings to their README", () => {
    const paths = [
      "part1/README.md",
      "part1/WritingIsGood.md",
      "part1/GitbookIsNice.md",
      "part2/README.md",
      "part2/First_part_of_part_2.md",
      "part2/Second_part_of_part_2.md",
    ];

    expect(summarize(paths, "git")).toBe(`# Summary

* [Part1](part1/README.md)
    * [WritingIsGood](part1/WritingIsGood.md)
    * [GitbookIsNice](part1/GitbookIsNice.md)
* [Part2](part2/README.md)
    * [First Part of Part 2](part2/First_part_of_part_2.md)
    * [Second Part of Part 2](part2/Second_part_of_part_2.md)
`);
  });

  it("matches README names case-insensitively at every depth", () => {
    const paths = ["readme.md", "guide/Readme.MD", "guide/deep/README.md"];

    expect(summarize(paths)).toBe(
      "# Summary\n\n" +
        "- [Guide](guide/Readme.MD)\n" +
        "    - [Deep](guide/deep/README.md)\n",
    );
  });

  it("does not treat names merely ending in readme as a README", () => {
    expect(summarize(["docs/not-readme.md"])).toBe(
      "# Summary\n\n- [Docs](#)\n    - [Not-readme](docs/not-readme.md)\n",
    );
  });

  it("titles files from their stem and chapters from their name", () => {
    expect(summarize(["01-getting_started/02_first_steps.md"])).toBe(
      "# Summary\n\n" +
        "- [Getting Started](#)\n" +
        "    - [First Steps](01-getting_started/02_first_steps.md)\n",
    );
  });

  it("renders an empty chapter heading when a chapter only holds subchapters", () => {
    expect(summarize(["a/b/c.md"], "git")).toBe(
      "# Summary\n\n* A\n    * B\n        * [C](a/b/c.md)\n",
    );
  });

  it("renders preferred chapters first", () => {
    const paths = [
      "part1/README.md",
      "part1/WritingIsGood.md",
      "part2/GitbookIsNice.md",
      "part2/README.md",
      "part3/file.md",
      "part4/file.md",
    ];

    expect(summarize(paths, "git", ["PART4", "part5", "part3"])).toBe(`# Summary

* Part4
    * [File](part4/file.md)
* Part3
    * [File](part3/file.md)
* [Part1](part1/README.md)
    * [WritingIsGood](part1/WritingIsGood.md)
* [Part2](part2/README.md)
    * [GitbookIsNice](part2/GitbookIsNice.md)
`);
  });

  it("only applies the preferred order at the top level", () => {
    const paths = ["top/a/x.md", "top/b/y.md"];

    expect(summarize(paths, "git", ["b"])).toBe(
      "# Summary\n\n" +
        "* Top\n" +
        "    * A\n" +
        "        * [X](top/a/x.md)\n" +
        "    * B\n" +
        "        * [Y](top/b/y.md)\n",
    );
  });
});

describe("orderChapters", () => {
  const chapters = ["part1", "part2", "part3", "part4"].map((name) => ({
    name,
    files: [],
    children: [],
  }));

  it("keeps the original order without preferences", () => {
    expect(orderChapters(chapters)).toBe(chapters);
    expect(orderChapters(chapters, [])).toBe(chapters);
  });

  it("puts matches first and ignores unknown names", () => {
    const ordered = orderChapters(chapters, ["part4", "part5", "part3"]);
    expect(ordered.map((c) => c.name)).toEqual([
      "part4",
      "part3",
      "part1",
      "part2",
    ]);
  });

  it("ignores repeated names", () => {
    const ordered = orderChapters(chapters, ["part2", "PART2", "part2"]);
    expect(ordered.map((c) => c.name)).toEqual([
      "part2",
      "part1",
      "part3",
      "part4",
    ]);
  });
});

describe("renderSummary", () => {
  function createContext(): SummaryContext {
    return {
      config: {
        format: "git",
        title: "Notes",
        sort: ["b"],
        output: "SUMMARY.md",
        directory: ".",
        overwrite: false,
        logging: { level: "error" },
      },
      logger: new Logger("error"),
      tracker: new Tracker(),
    };
  }

  it("requires the builder to have run", () => {
    expect(() => renderSummary(createContext())).toThrow(
      "Builder must run before renderer",
    );
  });

  it("renders with the configured format and sort", () => {
    const ctx = createContext();
    ctx.tree = build("Notes", ["a/x.md", "b/y.md"]).root;
    renderSummary(ctx);

    expect(ctx.summary).toBe(
      "# Notes\n\n* B\n    * [Y](b/y.md)\n* A\n    * [X](a/x.md)\n",
    );
  });
});
