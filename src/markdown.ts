export type TableCell = {
  content: string
  header?: boolean
  align?: 'left' | 'right'
}
export type TableRow = (TableCell | string)[]

function element(tag: string, content: string, attributes = ''): string {
  return [`<${tag}${attributes}>`, content, `</${tag}>`].join('\n')
}

function cell(value: TableCell | string): string {
  const {content, header, align}: TableCell =
    typeof value === 'string' ? {content: value} : value
  return element(header ? 'th' : 'td', content, align ? ` align="${align}"` : '')
}

export function makeHeaderRow(...names: string[]): TableRow {
  return names.map(content => ({content, header: true}))
}

export function table(rows: TableRow[]): string {
  return element(
    'table',
    rows.map(row => element('tr', row.map(cell).join('\n'))).join('\n')
  )
}

export function bold(text: string): string {
  return element('b', text)
}

export function heading(level: number, text: string): string {
  return `${'#'.repeat(level)} ${text}`
}
