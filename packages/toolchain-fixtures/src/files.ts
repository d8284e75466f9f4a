import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'

export function createTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`))
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true })
}

/** Bytes standing in for a serialized model; the fake toolchain never parses them */
export function writeFakeModel(dir: string, name = 'model.onnx'): string {
  const modelPath = path.join(dir, name)
  fs.mkdirSync(dir, { recursive: true })
  fs.writeFileSync(modelPath, Buffer.from('fake-onnx-model'))
  return modelPath
}
