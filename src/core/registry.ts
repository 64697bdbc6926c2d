/**
 * Symbol Registry
 *
 * Built once per run from the declared-symbol enumeration dumped by the
 * harness. Separates functions declared by the code under test ("subject"
 * symbols) from those of the harness and the test script.
 */

import { isAbsolute, resolve } from 'node:path'
import type { ResolvedSymbol, SymbolDeclaration } from '../types.js'

export interface RegistryOptions {
  /** Absolute path of the harness file */
  harnessFile: string
  /** Absolute path of the test script */
  specFile: string
}

// `name line file`, as printed by `declare -F name` under `shopt -s extdebug`
const DECLARATION_LINE = /^(\S+)\s+(\d+)\s+(.+)$/

// What bash reports for functions defined by `bash -c` or imported from the environment
const PSEUDO_SOURCES = new Set(['main', 'environment'])

/**
 * Parse the harness' symbol dump. Lines naming a symbol without a usable
 * location produce a declaration with no file.
 */
export function parseSymbolListing(text: string, cwd: string = process.cwd()): SymbolDeclaration[] {
  const declarations: SymbolDeclaration[] = []

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim()
    if (!line) continue

    const match = DECLARATION_LINE.exec(line)
    if (!match) {
      declarations.push({ name: line.split(/\s+/)[0] })
      continue
    }

    const [, name, lineNo, file] = match
    if (PSEUDO_SOURCES.has(file)) {
      declarations.push({ name })
      continue
    }
    declarations.push({
      name,
      line: Number(lineNo),
      file: isAbsolute(file) ? file : resolve(cwd, file),
    })
  }

  return declarations
}

export class SymbolRegistry {
  private readonly symbols = new Map<string, ResolvedSymbol>()
  private readonly subjects = new Map<string, ResolvedSymbol>()
  private readonly unresolvedNames = new Set<string>()

  private constructor(private readonly options: RegistryOptions) {}

  /**
   * Build a registry. A later declaration of a name replaces an earlier one.
   */
  static fromDeclarations(declarations: Iterable<SymbolDeclaration>, options: RegistryOptions): SymbolRegistry {
    const registry = new SymbolRegistry(options)
    for (const declaration of declarations) {
      registry.declare(declaration)
    }
    return registry
  }

  private declare(declaration: SymbolDeclaration): void {
    const { name, file, line } = declaration
    this.symbols.delete(name)
    this.subjects.delete(name)
    this.unresolvedNames.delete(name)

    // Without a location we cannot prove the symbol is code under test
    if (!file || line === undefined || !Number.isInteger(line) || line < 1) {
      this.unresolvedNames.add(name)
      return
    }

    const symbol: ResolvedSymbol = { name, file, line }
    this.symbols.set(name, symbol)
    if (file !== this.options.harnessFile && file !== this.options.specFile) {
      this.subjects.set(name, symbol)
    }
  }

  get harnessFile(): string {
    return this.options.harnessFile
  }

  get specFile(): string {
    return this.options.specFile
  }

  /**
   * Location of any resolved symbol, subject or not
   */
  lookup(name: string): ResolvedSymbol | undefined {
    return this.symbols.get(name)
  }

  isSubject(name: string): boolean {
    return this.subjects.has(name)
  }

  subjectSymbols(): ResolvedSymbol[] {
    return [...this.subjects.values()]
  }

  /**
   * Files declaring at least one subject symbol, sorted
   */
  subjectFiles(): string[] {
    return [...new Set([...this.subjects.values()].map((symbol) => symbol.file))].sort()
  }

  /**
   * Subject symbols declared in `file`, in line order
   */
  symbolsIn(file: string): ResolvedSymbol[] {
    return this.subjectSymbols()
      .filter((symbol) => symbol.file === file)
      .sort((a, b) => a.line - b.line)
  }

  unresolved(): string[] {
    return [...this.unresolvedNames].sort()
  }
}
