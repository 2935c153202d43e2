import fs from "fs";
import os from "os";
import path from "path";
import { FileWorkspaceStore } from "../src/infrastructure/storage/FileWorkspaceStore.js";

describe("FileWorkspaceStore", () => {
  let root: string;
  let store: FileWorkspaceStore;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "workspace-store-test-"));
    store = new FileWorkspaceStore(root, "job_");
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  test("should create unique workspaces under the root", async () => {
    const first = await store.createWorkspace();
    const second = await store.createWorkspace();

    expect(path.dirname(first)).toBe(root);
    expect(path.basename(first).startsWith("job_")).toBe(true);
    expect(first).not.toBe(second);
    expect(fs.statSync(first).isDirectory()).toBe(true);
  });

  test("should write, measure, move and read files", async () => {
    const workspace = await store.createWorkspace();
    const base = path.join(workspace, "turntable_base.mp4");
    const final = path.join(workspace, "turntable.mp4");

    await store.writeFile(base, Buffer.from("frames"));
    expect(await store.exists(base)).toBe(true);
    expect(await store.size(base)).toBe(6);

    await store.move(base, final);
    expect(await store.exists(base)).toBe(false);

    const chunks: Buffer[] = [];
    for await (const chunk of store.openRead(final)) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    expect(Buffer.concat(chunks).toString()).toBe("frames");
  });

  test("should create parent directories when copying", async () => {
    const workspace = await store.createWorkspace();
    const source = path.join(workspace, "turntable.webm");
    const destination = path.join(root, "storage", "renders", "job-1.webm");
    await store.writeFile(source, Buffer.from("webm"));

    await store.copy(source, destination);

    expect(fs.readFileSync(destination, "utf8")).toBe("webm");
    expect(await store.exists(source)).toBe(true);
  });

  test("should remove a workspace and tolerate a second removal", async () => {
    const workspace = await store.createWorkspace();
    await store.writeFile(path.join(workspace, "model.stl"), Buffer.from("solid"));

    await store.remove(workspace);
    await store.remove(workspace);

    expect(fs.existsSync(workspace)).toBe(false);
  });
});
