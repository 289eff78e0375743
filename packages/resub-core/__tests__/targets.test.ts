import { expect, test } from "vitest";
import { mkdir, mkdtemp, rm, symlink, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { describeTargetSource, enumerateTargets } from "../src/files/targets.ts";

async function collect(iterable: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const item of iterable) {
    out.push(item);
  }
  return out;
}

async function createTree(workspace: string): Promise<void> {
  await mkdir(path.join(workspace, "sub", "deeper"), { recursive: true });
  await writeFile(path.join(workspace, "a.txt"), "a", "utf8");
  await writeFile(path.join(workspace, "b.log"), "b", "utf8");
  await writeFile(path.join(workspace, "sub", "c.txt"), "c", "utf8");
  await writeFile(path.join(workspace, "sub", "deeper", "d.txt"), "d", "utf8");
}

test("enumerateTargets walks the root and filters file names", async () => {
  const workspace = await mkdtemp(path.join(tmpdir(), "resub-targets-"));

  try {
    await createTree(workspace);

    const files = await collect(
      enumerateTargets({ kind: "root", root: workspace }, { include: ["*.txt"] }),
    );

    expect([...files].sort()).toEqual([
      path.join(workspace, "a.txt"),
      path.join(workspace, "sub", "c.txt"),
      path.join(workspace, "sub", "deeper", "d.txt"),
    ]);
  } finally {
    await rm(workspace, { recursive: true, force: true });
  }
});

test("enumerateTargets yields a directory's files before its subdirectories", async () => {
  const workspace = await mkdtemp(path.join(tmpdir(), "resub-targets-"));

  try {
    await createTree(workspace);

    const files = await collect(enumerateTargets({ kind: "root", root: "." }, { cwd: workspace }));

    expect(files).toHaveLength(4);
    expect(files.slice(0, 2).sort()).toEqual(["a.txt", "b.log"]);
    expect(files.indexOf(path.join("sub", "c.txt"))).toBeLessThan(
      files.indexOf(path.join("sub", "deeper", "d.txt")),
    );
  } finally {
    await rm(workspace, { recursive: true, force: true });
  }
});

test("enumerateTargets restarts from scratch on every call", async () => {
  const workspace = await mkdtemp(path.join(tmpdir(), "resub-targets-"));

  try {
    await createTree(workspace);
    const source = { kind: "root", root: "." } as const;

    const first = await collect(enumerateTargets(source, { cwd: workspace, exclude: ["*.log"] }));
    const second = await collect(enumerateTargets(source, { cwd: workspace, exclude: ["*.log"] }));

    expect(first).toHaveLength(3);
    expect([...second].sort()).toEqual([...first].sort());
  } finally {
    await rm(workspace, { recursive: true, force: true });
  }
});

test("enumerateTargets yields explicit paths verbatim without filtering", async () => {
  const files = await collect(
    enumerateTargets({ kind: "paths", paths: ["keep.bak", "./x/y.txt"] }, { exclude: ["*.bak"] }),
  );

  expect(files).toEqual(["keep.bak", "./x/y.txt"]);
});

test("enumerateTargets skips blank lines in a paths file", async () => {
  const workspace = await mkdtemp(path.join(tmpdir(), "resub-targets-"));

  try {
    await writeFile(path.join(workspace, "list.txt"), "\nonly.bak\n", "utf8");

    const files = await collect(
      enumerateTargets(
        { kind: "paths-file", pathsFile: "list.txt" },
        { cwd: workspace, exclude: ["*.bak"] },
      ),
    );

    expect(files).toEqual(["only.bak"]);
  } finally {
    await rm(workspace, { recursive: true, force: true });
  }
});

test("enumerateTargets trims paths file lines and handles CRLF", async () => {
  const workspace = await mkdtemp(path.join(tmpdir(), "resub-targets-"));

  try {
    await writeFile(path.join(workspace, "list.txt"), "  a.txt  \r\n   \r\nb.txt", "utf8");

    const files = await collect(
      enumerateTargets({ kind: "paths-file", pathsFile: "list.txt" }, { cwd: workspace }),
    );

    expect(files).toEqual(["a.txt", "b.txt"]);
  } finally {
    await rm(workspace, { recursive: true, force: true });
  }
});

test("enumerateTargets yields nothing for a root that is a file", async () => {
  const workspace = await mkdtemp(path.join(tmpdir(), "resub-targets-"));

  try {
    const file = path.join(workspace, "a.txt");
    await writeFile(file, "a", "utf8");

    expect(await collect(enumerateTargets({ kind: "root", root: file }))).toEqual([]);
  } finally {
    await rm(workspace, { recursive: true, force: true });
  }
});

test("enumerateTargets yields nothing for a missing root", async () => {
  const workspace = await mkdtemp(path.join(tmpdir(), "resub-targets-"));

  try {
    expect(
      await collect(enumerateTargets({ kind: "root", root: "nope" }, { cwd: workspace })),
    ).toEqual([]);
  } finally {
    await rm(workspace, { recursive: true, force: true });
  }
});

test("enumerateTargets skips a subdirectory that can no longer be listed", async () => {
  const workspace = await mkdtemp(path.join(tmpdir(), "resub-targets-"));

  try {
    await createTree(workspace);
    await mkdir(path.join(workspace, "gone"));
    await writeFile(path.join(workspace, "gone", "e.txt"), "e", "utf8");

    const files: string[] = [];
    for await (const file of enumerateTargets({ kind: "root", root: "." }, { cwd: workspace })) {
      // The root listing is complete before its first file is yielded.
      if (files.length === 0) {
        await rm(path.join(workspace, "gone"), { recursive: true });
      }
      files.push(file);
    }

    expect([...files].sort()).toEqual([
      "a.txt",
      "b.log",
      path.join("sub", "c.txt"),
      path.join("sub", "deeper", "d.txt"),
    ]);
  } finally {
    await rm(workspace, { recursive: true, force: true });
  }
});

test("enumerateTargets yields file and dangling symlinks but not directory links", async () => {
  const workspace = await mkdtemp(path.join(tmpdir(), "resub-targets-"));

  try {
    await createTree(workspace);
    await symlink(path.join(workspace, "a.txt"), path.join(workspace, "link.txt"));
    await symlink(path.join(workspace, "missing.txt"), path.join(workspace, "dangling.txt"));
    await symlink(path.join(workspace, "sub"), path.join(workspace, "sublink"));

    const files = await collect(
      enumerateTargets({ kind: "root", root: "." }, { cwd: workspace, include: ["*.txt"] }),
    );

    expect([...files].sort()).toEqual([
      "a.txt",
      "dangling.txt",
      "link.txt",
      path.join("sub", "c.txt"),
      path.join("sub", "deeper", "d.txt"),
    ]);
  } finally {
    await rm(workspace, { recursive: true, force: true });
  }
});

test("describeTargetSource names the source", () => {
  expect(describeTargetSource({ kind: "root", root: "src" })).toBe("root src");
  expect(describeTargetSource({ kind: "paths", paths: ["a", "b"] })).toBe("2 explicit paths");
  expect(describeTargetSource({ kind: "paths-file", pathsFile: "list.txt" })).toBe(
    "paths file list.txt",
  );
});
