export enum OutputFormat {
  Line = "line",
  Json = "json",
}

export enum CommandName {
  Cite = "cite",
  Verify = "verify",
}
