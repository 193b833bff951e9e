import { basename, extname, join } from "node:path";
import { resolvePythonBinary } from "./env.js";
import { UnsupportedLanguageError } from "./errors.js";
import type { CommandSpec, ExecutionPlan } from "./types.js";

export interface PlanContext {
  sourcePath: string;
  /** Source file name without its extension. */
  baseName: string;
  /** Scratch directory that receives compiled artifacts. */
  buildDir: string;
}

export interface LanguageSpec {
  name: string;
  compile: ((ctx: PlanContext) => CommandSpec) | null;
  run: (ctx: PlanContext) => CommandSpec;
}

export type LanguageTable = Readonly<Record<string, LanguageSpec>>;

const JVM_RUN_FLAGS = ["-DONLINE_JUDGE=true", "-Duser.language=en", "-Duser.region=US", "-Duser.variant=US"];

function binary(ctx: PlanContext): string {
  return join(ctx.buildDir, ctx.baseName);
}

export const LANGUAGES: LanguageTable = {
  c: {
    name: "C",
    compile: (ctx) => ({
      command: "gcc",
      args: ["-static", "-DONLINE_JUDGE", "-fno-asm", "-O2", "-s", "-o", binary(ctx), ctx.sourcePath, "-lm"]
    }),
    run: (ctx) => ({ command: binary(ctx), args: [] })
  },
  cpp: {
    name: "C++",
    compile: (ctx) => ({
      command: "g++",
      args: ["-DONLINE_JUDGE", "-O2", "-std=c++17", "-o", binary(ctx), ctx.sourcePath]
    }),
    run: (ctx) => ({ command: binary(ctx), args: [] })
  },
  java: {
    name: "Java",
    compile: (ctx) => ({ command: "javac", args: ["-d", ctx.buildDir, ctx.sourcePath] }),
    run: (ctx) => ({ command: "java", args: [...JVM_RUN_FLAGS, "-cp", ctx.buildDir, ctx.baseName] })
  },
  kt: {
    name: "Kotlin",
    compile: (ctx) => ({ command: "kotlinc", args: ["-d", ctx.buildDir, ctx.sourcePath] }),
    run: (ctx) => ({ command: "kotlin", args: [...JVM_RUN_FLAGS, "-cp", ctx.buildDir, `${ctx.baseName}Kt`] })
  },
  hs: {
    name: "Haskell",
    compile: (ctx) => ({
      command: "ghc",
      args: ["--make", "-O", "-dynamic", "-outputdir", ctx.buildDir, "-o", binary(ctx), ctx.sourcePath]
    }),
    run: (ctx) => ({ command: binary(ctx), args: [] })
  },
  py: {
    name: "Python",
    compile: null,
    run: (ctx) => ({ command: resolvePythonBinary(), args: [ctx.sourcePath] })
  },
  rb: {
    name: "Ruby",
    compile: null,
    run: (ctx) => ({ command: "ruby", args: [ctx.sourcePath] })
  },
  js: {
    name: "JavaScript",
    compile: null,
    run: (ctx) => ({ command: process.execPath, args: [ctx.sourcePath] })
  }
};

export function sourceExtension(sourcePath: string): string {
  return extname(sourcePath).replace(/^\./, "").toLowerCase();
}

export function findLanguage(sourcePath: string, languages: LanguageTable = LANGUAGES): LanguageSpec {
  const extension = sourceExtension(sourcePath);
  const language = Object.hasOwn(languages, extension) ? languages[extension] : undefined;
  if (!language) {
    throw new UnsupportedLanguageError(extension);
  }
  return language;
}

export function resolvePlan(sourcePath: string, buildDir: string, languages: LanguageTable = LANGUAGES): ExecutionPlan {
  const language = findLanguage(sourcePath, languages);
  const ctx: PlanContext = {
    sourcePath,
    baseName: basename(sourcePath, extname(sourcePath)),
    buildDir
  };

  return Object.freeze({
    sourcePath,
    language: language.name,
    compileCommand: language.compile ? language.compile(ctx) : null,
    runCommand: language.run(ctx)
  });
}
