export {
  MANIFEST_FILENAME,
  HOME_FILENAME,
  GENERAL_FOLDER,
  buildManifestPath,
  buildHomePath,
  buildFolderDir,
  buildDashboardPath,
  toSafeFilename,
} from './paths.js'

export {
  isFile,
  isDirectory,
  readFolderManifest,
  writeFolderManifest,
  listFolderDirs,
  listDashboardFiles,
  readDashboardFile,
  writeDashboardFile,
  describeSourceTree,
} from './manager.js'
