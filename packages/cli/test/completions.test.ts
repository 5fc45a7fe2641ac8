import { describe, expect, it } from "vitest";
import { completionScript } from "../src/completions.js";

describe("shell completions", () => {
  const commands = ["call", "tools", "docs", "projects", "advisors", "cost", "check", "overview", "completion"];

  it("generates zsh completions with core commands", () => {
    const script = completionScript("zsh", commands);
    expect(script).toContain("#compdef supabase-mcp");
    expect(script).toContain('"advisors" "call" "check"');
    expect(script).toContain("--type[advisor type]:type:(security performance all)");
  });

  it("generates bash completions", () => {
    const script = completionScript("bash", commands);
    expect(script).toContain("complete -F _supabase_mcp_complete supabase-mcp");
    expect(script).toContain('local commands="advisors call check completion cost docs overview projects tools"');
  });

  it("includes commands passed at runtime", () => {
    const script = completionScript("fish", [...commands, "custom-command", " call "]);
    expect(script).toContain('complete -c supabase-mcp -f -n "__fish_use_subcommand" -a "custom-command"');
    expect(script.match(/-a "call"/g)).toHaveLength(1);
    expect(script).toContain("-l type -a 'project branch'");
  });
});
