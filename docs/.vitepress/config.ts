import { defineConfig } from "vitepress";

export default defineConfig({
  title: "csg2xcsg",
  description: "Convert OpenSCAD .csg dumps to xcsg XML.",
  base: "/csg2xcsg/",
  themeConfig: {
    search: {
      provider: "local",
    },
    nav: [
      { text: "Guide", link: "/guide/getting-started" },
      { text: "Reference", link: "/reference/mapping" },
    ],
    sidebar: {
      "/guide/": [
        { text: "Getting Started", link: "/guide/getting-started" },
      ],
      "/reference/": [
        { text: "Tag Mapping", link: "/reference/mapping" },
        { text: "Errors", link: "/reference/errors" },
      ],
    },
  },
});
