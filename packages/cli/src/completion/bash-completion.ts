/**
 * Bash completion synthesis.
 *
 * The emitted script is static: every branch of the command tree is spelled
 * out as `case` arms, so a tab press never re-runs the program. At run time
 * the script
 *   1. replays the longest-prefix walk over the words already typed,
 *   2. replays the argument resolver over the remaining words: a keyword
 *      binds its name, a positional binds the first parameter still free,
 *      and a trailing `--name` leaves that name pending,
 *   3. offers child command names right after a path, `--param` names for a
 *      word starting with `--`, and otherwise the hints of the parameter the
 *      current word would bind (the first one still free), in the order
 *      they were registered.
 *
 * Output is a pure function of the tree and the program name.
 */

import type { CommandNode, CommandTree } from '../command-tree.js'

const INDENT = '    '

/** Single-quote for bash; any byte survives except NUL. */
export function shellQuote(value: string): string {
  return `'${value.replaceAll(`'`, `'\\''`)}'`
}

/** `my-tool` → `_my_tool_completion` */
export function completionFunctionName(programName: string): string {
  return `_${programName.replace(/[^A-Za-z0-9_]/g, '_')}_completion`
}

/** Key the script uses for a node: "" for the root, "/a/b" otherwise. */
function nodeKey(node: CommandNode): string {
  return node.isRoot ? '' : `/${node.pathString}`
}

function arm(pattern: string, body: string, depth: number): string {
  return `${INDENT.repeat(depth)}${pattern}) ${body} ;;`
}

function offer(fn: string, values: readonly string[]): string {
  return [`${fn}_offer "$cur"`, ...values.map(shellQuote)].join(' ')
}

export function synthesizeBashCompletion(tree: CommandTree, programName: string): string {
  const fn = completionFunctionName(programName)
  const nodes = [...tree.root.walk()]

  const pathArms = nodes
    .filter((n) => !n.isRoot)
    .map((n) => arm(shellQuote(nodeKey(n)), 'node="$node/${words[i]}"', 3))

  const paramArms = nodes.flatMap((n) =>
    n.record && n.record.params.length > 0
      ? [arm(shellQuote(nodeKey(n)), `params=${shellQuote(n.record.params.map((p) => p.name).join(' '))}`, 2)]
      : [],
  )

  const childArms = nodes.flatMap((n) =>
    n.children().length > 0 ? [arm(shellQuote(nodeKey(n)), offer(fn, n.childNames()), 4)] : [],
  )

  const hintArms = nodes.flatMap((n) =>
    n.record
      ? [...n.record.completions].map(([param, values]) => arm(shellQuote(`${nodeKey(n)}:${param}`), offer(fn, values), 2))
      : [],
  )

  const lines = [
    `# bash completion for ${programName}`,
    `# regenerate with: ${programName} --completion`,
    '',
    `${fn}_offer() {`,
    '    local cur="$1" candidate',
    '    shift',
    '    for candidate in "$@"; do',
    '        if [[ "$candidate" == "$cur"* ]]; then',
    '            COMPREPLY+=("$candidate")',
    '        fi',
    '    done',
    '}',
    '',
    `${fn}() {`,
    '    local line="${COMP_LINE:0:COMP_POINT}"',
    '    local -a words',
    '    read -ra words <<< "$line"',
    '    local cur=""',
    '    if [[ -n "$line" && "$line" != *[[:space:]] ]]; then',
    '        cur="${words[${#words[@]}-1]}"',
    `        unset 'words[\${#words[@]}-1]'`,
    '    fi',
    '    COMPREPLY=()',
    '',
    '    local node="" i=1',
    '    while [ "$i" -lt "${#words[@]}" ]; do',
    '        case "$node/${words[i]}" in',
    ...pathArms,
    arm('*', 'break', 3),
    '        esac',
    '        i=$((i + 1))',
    '    done',
    '',
    '    local params=""',
    '    case "$node" in',
    ...paramArms,
    arm('*', ':', 2),
    '    esac',
    '',
    '    local bound=" " pending="" argwords=0 word p',
    '    while [ "$i" -lt "${#words[@]}" ]; do',
    '        word="${words[i]}"',
    '        argwords=$((argwords + 1))',
    '        if [ -n "$pending" ]; then',
    '            bound="$bound$pending "',
    '            pending=""',
    '        elif [[ "$word" == --*=* ]]; then',
    '            word="${word#--}"',
    '            bound="$bound${word%%=*} "',
    '        elif [[ "$word" == --* ]]; then',
    '            pending="${word#--}"',
    '        else',
    '            for p in $params; do',
    '                case "$bound" in',
    arm('*" $p "*', 'continue', 5),
    '                esac',
    '                bound="$bound$p "',
    '                break',
    '            done',
    '        fi',
    '        i=$((i + 1))',
    '    done',
    '',
    '    local arg=""',
    '    if [ -n "$pending" ]; then',
    '        arg="$pending"',
    '    elif [[ "$cur" == --*=* ]]; then',
    '        arg="${cur%%=*}"',
    '        arg="${arg#--}"',
    '        cur="${cur#*=}"',
    '    elif [[ "$cur" == --* ]]; then',
    '        local -a flags=()',
    '        if [ -z "$node" ] && [ "$argwords" -eq 0 ]; then',
    '            flags+=("--completion")',
    '        fi',
    '        for p in $params; do',
    '            flags+=("--$p")',
    '        done',
    `        ${fn}_offer "$cur" "\${flags[@]}"`,
    '        return 0',
    '    else',
    '        if [ "$argwords" -eq 0 ]; then',
    '            case "$node" in',
    ...childArms,
    arm('*', ':', 4),
    '            esac',
    '        fi',
    '        for p in $params; do',
    '            case "$bound" in',
    arm('*" $p "*', 'continue', 4),
    '            esac',
    '            arg="$p"',
    '            break',
    '        done',
    '    fi',
    '',
    '    case "$node:$arg" in',
    ...hintArms,
    arm('*', ':', 2),
    '    esac',
    '    return 0',
    '}',
    '',
    `complete -F ${fn} ${shellQuote(programName)}`,
  ]

  return lines.join('\n') + '\n'
}
