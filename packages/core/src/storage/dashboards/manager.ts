import { mkdir, readFile, writeFile, readdir, rename, stat } from 'node:fs/promises'
import { dirname, join } from 'node:path'
import { randomUUID } from 'node:crypto'
import {
  DashboardDocumentSchema,
  type DashboardDocument,
} from '../../schemas/dashboard.js'
import { FolderManifestSchema, type FolderManifest } from '../../schemas/folder.js'
import { buildManifestPath, MANIFEST_FILENAME, HOME_FILENAME } from './paths.js'

async function statOrNull(path: string) {
  try {
    return await stat(path)
  } catch (err: unknown) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      return null
    }
    throw err
  }
}

export async function isFile(path: string): Promise<boolean> {
  const stats = await statOrNull(path)
  return stats !== null && stats.isFile()
}

export async function isDirectory(path: string): Promise<boolean> {
  const stats = await statOrNull(path)
  return stats !== null && stats.isDirectory()
}

/** Read `folders.json`. Null when the file is absent; parse and validation errors propagate. */
export async function readFolderManifest(baseDir: string): Promise<FolderManifest | null> {
  const manifestPath = buildManifestPath(baseDir)
  if (!(await isFile(manifestPath))) {
    return null
  }
  const content = await readFile(manifestPath, 'utf-8')
  return FolderManifestSchema.parse(JSON.parse(content))
}

export async function writeFolderManifest(
  baseDir: string,
  manifest: FolderManifest,
): Promise<string> {
  const manifestPath = buildManifestPath(baseDir)
  await atomicWriteJson(manifestPath, manifest)
  return manifestPath
}

/** Names of the immediate subdirectories, sorted. Plain files are ignored. */
export async function listFolderDirs(baseDir: string): Promise<string[]> {
  const entries = await readdir(baseDir)
  const dirs: string[] = []
  for (const name of entries.sort()) {
    if (await isDirectory(join(baseDir, name))) {
      dirs.push(name)
    }
  }
  return dirs
}

/** Names of the `.json` files in a folder directory, sorted. */
export async function listDashboardFiles(folderDir: string): Promise<string[]> {
  const entries = await readdir(folderDir)
  const files: string[] = []
  for (const name of entries.filter((f) => f.endsWith('.json')).sort()) {
    if (await isFile(join(folderDir, name))) {
      files.push(name)
    }
  }
  return files
}

/** Read and validate a dashboard document */
export async function readDashboardFile(filePath: string): Promise<DashboardDocument> {
  const content = await readFile(filePath, 'utf-8')
  return DashboardDocumentSchema.parse(JSON.parse(content))
}

export async function writeDashboardFile(
  filePath: string,
  document: DashboardDocument,
): Promise<void> {
  await atomicWriteJson(filePath, document)
}

/**
 * Indented listing of what an upload would read:
 * top-level manifest/home files, then each folder with its dashboards.
 */
export async function describeSourceTree(baseDir: string): Promise<string[]> {
  const lines: string[] = []

  for (const name of [MANIFEST_FILENAME, HOME_FILENAME]) {
    if (await isFile(join(baseDir, name))) {
      lines.push(name)
    }
  }

  for (const folder of await listFolderDirs(baseDir)) {
    lines.push(`${folder}/`)
    for (const file of await listDashboardFiles(join(baseDir, folder))) {
      lines.push(`  ${file}`)
    }
  }

  return lines
}

/** Atomic write: mkdir -p, write temp file, rename */
async function atomicWriteJson(filePath: string, value: unknown): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true })
  const tempPath = filePath + '.tmp.' + randomUUID()
  await writeFile(tempPath, JSON.stringify(value, null, 2) + '\n', 'utf-8')
  await rename(tempPath, filePath)
}
