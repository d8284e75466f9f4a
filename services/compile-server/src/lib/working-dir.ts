import * as fs from 'fs'
import * as path from 'path'
import {
  ARTIFACTS_ARCHIVE_NAME,
  ARTIFACTS_DIR_NAME,
  CALIBRATION_DIR_NAME,
  MODEL_FILE_NAME,
} from '@npu-latency/shared'

export interface WorkingDirLayout {
  root: string
  modelPath: string
  artifactsDir: string
  calibrationDir: string
  archivePath: string
}

export function workingDirLayout(root: string): WorkingDirLayout {
  const resolved = path.resolve(root)
  return {
    root: resolved,
    modelPath: path.join(resolved, MODEL_FILE_NAME),
    artifactsDir: path.join(resolved, ARTIFACTS_DIR_NAME),
    calibrationDir: path.join(resolved, CALIBRATION_DIR_NAME),
    archivePath: path.join(resolved, ARTIFACTS_ARCHIVE_NAME),
  }
}

/**
 * Wipe the working tree and recreate the empty artifact and calibration slots.
 * Whatever a previous job left behind is discarded.
 */
export function resetWorkingDir(layout: WorkingDirLayout): void {
  fs.rmSync(layout.root, { recursive: true, force: true })
  fs.mkdirSync(layout.artifactsDir, { recursive: true })
  fs.mkdirSync(layout.calibrationDir, { recursive: true })
}
