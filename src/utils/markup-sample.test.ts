import { describe, expect, it } from "vitest";

import { buildMarkupSample, buildStructureSkeleton } from "./markup-sample";

describe("buildMarkupSample", () => {
  it("keeps structure and selector attributes, drops scripts and head", () => {
    const html = `<html><head><title>Index</title><style>.a{}</style></head>
<body>
  <div class="slot noticia" onclick="track()">
    <div class="volanta">MARKETS</div>
    <h2 class="titulo"><a href="/news/1" style="color:red">Casino Revenue Climbs</a></h2>
  </div>
  <script>window.x = 1;</script>
</body></html>`;

    expect(buildMarkupSample(html)).toBe(
      '<div class="slot noticia"><div class="volanta">MARKETS</div><h2 class="titulo"><a href="/news/1">Casino Revenue Climbs</a></h2></div>'
    );
  });

  it("keeps image sources", () => {
    const sample = buildMarkupSample(
      '<div class="imagen"><img src="/img/x.jpg" width="10"></div>'
    );

    expect(sample).toContain('src="/img/x.jpg"');
    expect(sample).not.toContain("width");
  });

  it("truncates to the requested length", () => {
    const html = `<ul>${"<li>Item</li>".repeat(100)}</ul>`;

    expect(buildMarkupSample(html, 25)).toBe("<ul><li>Item</li><li>Item");
  });
});

describe("buildStructureSkeleton", () => {
  it("drops text, links and image sources but keeps classes", () => {
    const sample =
      '<div class="slot"><h2 class="titulo"><a href="/news/1">Casino Revenue Climbs</a></h2><img src="/img/x.jpg" alt="x"></div>';

    expect(buildStructureSkeleton(sample)).toBe(
      '<div class="slot"><h2 class="titulo"><a></a></h2><img /></div>'
    );
  });
});
