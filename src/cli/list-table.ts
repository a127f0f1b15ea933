import stringWidth from "string-width"
import { getBorderCharacters, table } from "table"
import type { ListPathTruncate, ListTableColumn } from "../config/types"

export type ListRow = {
  readonly repository: string
  readonly branch: string
  readonly remote: string
  readonly workspace: string | null
  readonly path: string
}

const ELLIPSIS = "…"

/** Keeps the end of `value`, which is the part of a path that tells worktrees apart. */
export const truncateStart = (value: string, width: number): string => {
  if (stringWidth(value) <= width) {
    return value
  }
  const budget = width - stringWidth(ELLIPSIS)
  const characters = Array.from(value)
  let tail = ""
  for (let index = characters.length - 1; index >= 0; index -= 1) {
    const candidate = `${characters[index] ?? ""}${tail}`
    if (stringWidth(candidate) > budget) {
      break
    }
    tail = candidate
  }
  return `${ELLIPSIS}${tail}`
}

const cellValue = (row: ListRow, column: ListTableColumn): string => {
  switch (column) {
    case "repository":
      return row.repository
    case "branch":
      return row.branch
    case "remote":
      return row.remote
    case "workspace":
      return row.workspace ?? "-"
    case "path":
      return row.path
  }
}

// Each cell carries one space of padding per side; borders add one column per separator.
const availablePathWidth = ({
  cells,
  columns,
  maxWidth,
  minWidth,
}: {
  readonly cells: readonly string[][]
  readonly columns: readonly ListTableColumn[]
  readonly maxWidth: number
  readonly minWidth: number
}): number => {
  let used = columns.length + 1
  for (const [index, column] of columns.entries()) {
    if (column === "path") {
      used += 2
      continue
    }
    used += 2 + Math.max(...cells.map((row) => stringWidth(row[index] ?? "")))
  }
  return Math.max(minWidth, maxWidth - used)
}

export const renderListTable = ({
  rows,
  columns,
  truncate,
  minWidth,
  maxWidth,
}: {
  readonly rows: readonly ListRow[]
  readonly columns: readonly ListTableColumn[]
  readonly truncate: ListPathTruncate
  readonly minWidth: number
  /** Terminal width; null when stdout is not a terminal. */
  readonly maxWidth: number | null
}): string => {
  const header = [...columns]
  const body = rows.map((row) => columns.map((column) => cellValue(row, column)))
  const pathIndex = columns.indexOf("path")

  if (truncate === "auto" && maxWidth !== null && pathIndex >= 0) {
    const width = availablePathWidth({ cells: [header, ...body], columns, maxWidth, minWidth })
    for (const cells of body) {
      cells[pathIndex] = truncateStart(cells[pathIndex] ?? "", width)
    }
  }

  return table([header, ...body], {
    border: getBorderCharacters("norc"),
    drawHorizontalLine: (lineIndex, rowCount) => {
      return lineIndex === 0 || lineIndex === 1 || lineIndex === rowCount
    },
  }).trimEnd()
}
