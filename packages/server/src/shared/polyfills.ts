/**
 * Browser Polyfills - Browser APIs three.js expects when exporting GLB
 *
 * three's GLTFExporter assembles binary glTF from `Blob` parts and reads
 * them back through `FileReader`. Node.js 20 ships `Blob` but no
 * `FileReader`, so a minimal one backed by `Blob.arrayBuffer()` is installed
 * here.
 *
 * **What gets polyfilled**:
 * - **FileReader** - `readAsArrayBuffer` with `onload`/`onloadend`/`onerror`
 *
 * **Load Order**:
 * Import this file before the exporter runs. glb-exporter.ts imports it
 * first thing.
 */

type ReaderCallback = ((this: NodeFileReader) => void) | null;

class NodeFileReader {
  result: ArrayBuffer | null = null;
  error: Error | null = null;
  readyState = 0;
  onload: ReaderCallback = null;
  onloadend: ReaderCallback = null;
  onerror: ReaderCallback = null;

  readAsArrayBuffer(blob: Blob): void {
    this.readyState = 1;
    void blob.arrayBuffer().then(
      (buffer) => {
        this.result = buffer;
        this.readyState = 2;
        this.onload?.call(this);
        this.onloadend?.call(this);
      },
      (err: unknown) => {
        this.error = err instanceof Error ? err : new Error(String(err));
        this.readyState = 2;
        this.onerror?.call(this);
        this.onloadend?.call(this);
      },
    );
  }
}

if (!("FileReader" in globalThis)) {
  Object.defineProperty(globalThis, "FileReader", {
    value: NodeFileReader,
    writable: true,
    configurable: true,
  });
}

export {};
