import { describe, expect, it } from "@jest/globals";
import { ParseError } from "../../src/core/errors";
import { createSameSitePredicate, discoverLinks, DiscoverOptions, normalizeUrl } from "../../src/crawl/htmlParser";

const PAGE_URL = "https://archive.example.org/www/archive/problems/";

const ARCHIVE_HTML = `
<html>
  <body>
    <div id="nav"><a href="/elsewhere">Elsewhere</a></div>
    <div id="content">
      <a href="2019/">February 2019</a>
      <a href="/www/archive/problems/2018.html">2018</a>
      <a href="guts.pdf">  Guts
        Round </a>
      <a href="guts.pdf#page=2">Guts again</a>
      <a href="https://cdn.example.org/files/team.PDF">Team</a>
      <a href="download?id=7" type="application/pdf">Power round</a>
      <a href="mailto:someone@example.com">Mail</a>
      <a href="https://other.example.net/page">External</a>
      <a href="photo.jpg">Photo</a>
      <a href="#top">Top</a>
    </div>
  </body>
</html>`;

const OPTIONS: DiscoverOptions = {
  contentSelector: "#content",
  documentExtensions: [".pdf"],
  isSameSite: createSameSitePredicate("exact_host"),
};

describe("discoverLinks", () => {
  it("classifies documents and subpages inside the content container", () => {
    const result = discoverLinks(ARCHIVE_HTML, PAGE_URL, OPTIONS);

    expect(result.documents).toEqual([
      {
        url: "https://archive.example.org/www/archive/problems/guts.pdf",
        sourcePage: PAGE_URL,
        title: "Guts Round",
      },
      { url: "https://cdn.example.org/files/team.PDF", sourcePage: PAGE_URL, title: "Team" },
      {
        url: "https://archive.example.org/www/archive/problems/download?id=7",
        sourcePage: PAGE_URL,
        title: "Power round",
      },
    ]);
    expect(result.subpages).toEqual([
      "https://archive.example.org/www/archive/problems/2019/",
      "https://archive.example.org/www/archive/problems/2018.html",
    ]);
  });

  it("is deterministic for identical input", () => {
    expect(discoverLinks(ARCHIVE_HTML, PAGE_URL, OPTIONS)).toEqual(discoverLinks(ARCHIVE_HTML, PAGE_URL, OPTIONS));
  });

  it("throws a ParseError when the content container is missing", () => {
    const html = "<html><body><a href='a.pdf'>A</a></body></html>";

    expect(() => discoverLinks(html, PAGE_URL, OPTIONS)).toThrow(ParseError);
  });

  it("scans the whole page when no container is configured", () => {
    const result = discoverLinks(ARCHIVE_HTML, PAGE_URL, { ...OPTIONS, contentSelector: undefined });

    expect(result.subpages[0]).toBe("https://archive.example.org/elsewhere");
    expect(result.documents).toHaveLength(3);
  });

  it("honours additional document extensions", () => {
    const html = `<div id="content"><a href="solutions.zip">Solutions</a><a href="a.pdf">A</a></div>`;

    const result = discoverLinks(html, PAGE_URL, { ...OPTIONS, documentExtensions: [".pdf", ".zip"] });

    expect(result.documents.map((link) => link.url)).toEqual([
      "https://archive.example.org/www/archive/problems/solutions.zip",
      "https://archive.example.org/www/archive/problems/a.pdf",
    ]);
  });

  it("omits the title when the anchor has no text", () => {
    const html = `<div id="content"><a href="a.pdf"></a></div>`;

    const result = discoverLinks(html, PAGE_URL, OPTIONS);

    expect(result.documents).toEqual([
      { url: "https://archive.example.org/www/archive/problems/a.pdf", sourcePage: PAGE_URL },
    ]);
  });
});

describe("createSameSitePredicate", () => {
  const page = new URL("https://www.archive.example.org/problems");

  it("matches the exact host only by default", () => {
    const sameSite = createSameSitePredicate("exact_host");

    expect(sameSite(new URL("https://www.archive.example.org/other"), page)).toBe(true);
    expect(sameSite(new URL("https://files.archive.example.org/other"), page)).toBe(false);
  });

  it("accepts subdomains when configured", () => {
    const sameSite = createSameSitePredicate("include_subdomains");

    expect(sameSite(new URL("https://files.archive.example.org/other"), page)).toBe(true);
    expect(sameSite(new URL("https://archive.example.org/other"), page)).toBe(true);
    expect(sameSite(new URL("https://evilarchive.example.org/other"), page)).toBe(false);
  });
});

describe("normalizeUrl", () => {
  it("resolves relative links and drops fragments", () => {
    expect(normalizeUrl("../2017/#top", PAGE_URL)).toBe("https://archive.example.org/www/archive/2017/");
  });

  it("ignores non-http schemes", () => {
    expect(normalizeUrl("javascript:void(0)", PAGE_URL)).toBeUndefined();
    expect(normalizeUrl("ftp://archive.example.org/a.pdf", PAGE_URL)).toBeUndefined();
  });
});
