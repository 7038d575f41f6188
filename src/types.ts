export enum SupportedLanguage {
  PY = "Python",
  JS = "JavaScript",
  TS = "TypeScript",
  JAVA = "Java",
  CS = "C#",
  GO = "Go",
  RUST = "Rust",
  CPP = "C++",
  RUBY = "Ruby",
  PHP = "PHP",
}

export type Directive = "generate" | "update";
