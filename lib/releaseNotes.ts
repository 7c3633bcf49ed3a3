//! Release description: the published packages grouped by platform.

export const categories = [
  "windows",
  "macos",
  "linux-gnu",
  "linux-musl",
] as const;

export type Category = (typeof categories)[number];

export type Sections = Record<Category, string[]>;

const displayNames: Record<Category, string> = {
  windows: "Windows",
  macos: "macOS",
  "linux-gnu": "Linux GNU",
  "linux-musl": "Linux musl",
};

export const emptySections = (): Sections => ({
  windows: [],
  macos: [],
  "linux-gnu": [],
  "linux-musl": [],
});

/// The first category whose name the filename contains, in priority order.
export const categoryOf = (filename: string): Category | undefined =>
  categories.find((category) => filename.includes(category));

export const categorizePackages = (
  filenames: ReadonlyArray<string>,
): Sections => {
  const sections = emptySections();
  for (const filename of filenames) {
    const category = categoryOf(filename);
    if (category !== undefined) {
      sections[category].push(filename);
    }
  }
  return sections;
};

export const formatBuildDate = (date: Date) =>
  [
    date.getFullYear(),
    String(date.getMonth() + 1).padStart(2, "0"),
    String(date.getDate()).padStart(2, "0"),
  ].join("-");

const section = (category: Category, files: ReadonlyArray<string>) =>
  files.length === 0
    ? ""
    : `\n### ${displayNames[category]} executables\n` +
      files.map((file) => `- ${file}\n`).join("");

export const generateReleaseNotes = (
  tag: string,
  sections: Sections,
  date: Date,
) =>
  "## Tebako runtime packages\n" +
  "\n" +
  `Release version: ${tag}\n` +
  `Build date: ${formatBuildDate(date)}\n` +
  "\n" +
  categories.map((category) => section(category, sections[category])).join("");
