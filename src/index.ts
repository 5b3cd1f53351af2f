export type {
    CellValue,
    Dataset,
    DiffStats,
    Group,
    GroupKey,
    GroupKeyFn,
    GroupKeyValue,
    GroupStats,
    NamedDataset,
    RowRecord,
} from './types/data';

export { diffDatasets, diffWithinScope, getDiffStats, scopeDataset } from './utils/comparisonEngine';
export type { ScopedDiffResult } from './utils/comparisonEngine';
export { flattenGroups, getGroupStats, groupRows } from './utils/groupingEngine';
export {
    buildKeyTuple,
    encodeKeyValue,
    findColumnByKeywords,
    normalizeKey,
    resolveColumn,
    uniqueColumnName,
} from './utils/keyManager';
export {
    ConfigError,
    DerivationError,
    describeError,
    EmptyKeyError,
    isSheetClerkError,
    SchemaError,
    SheetClerkError,
    WorkbookError,
} from './utils/errors';
export type { ClerkErrorKind } from './utils/errors';

export {
    alignColumns,
    concatDatasets,
    loadDataset,
    parseDateText,
    parseWorkbook,
    projectColumns,
    renameColumns,
} from './utils/excelParser';
export type { LoadOptions, ParsedWorkbook, ParseOptions } from './utils/excelParser';
export { writeDataset, writeGroups } from './utils/exportResults';
export type { GroupLayout, WriteGroupsOptions, WriteOptions } from './utils/exportResults';
export { findNestedFiles, numberedName, relocateFiles } from './utils/fileRelocator';
export type { RelocationOptions, RelocationResult } from './utils/fileRelocator';
export {
    extractArchive,
    extractLatestArchives,
    parseArchiveName,
    selectLatestArchives,
} from './utils/archiveExtractor';
export type { ArchiveResult, ExtractLatestReport, PruneResult } from './utils/archiveExtractor';
export { DEFAULT_CONFIG, loadProjectConfig, mergeConfig } from './utils/projectConfig';
export type { ClerkConfig } from './utils/projectConfig';
