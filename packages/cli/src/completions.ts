const ADVISOR_TYPES = "security performance all";
const COST_TYPES = "project branch";

function normalizedCommandList(commands: string[]) {
  return [...new Set(commands.map((command) => command.trim()).filter(Boolean))]
    .sort((a, b) => a.localeCompare(b));
}

function bashCompletion(commands: string[]) {
  const commandList = normalizedCommandList(commands);
  return `# supabase-mcp bash completion
_supabase_mcp_complete() {
  local cur prev words cword
  _init_completion || return
  local commands="${commandList.join(" ")}"

  if [[ $cword -eq 1 ]]; then
    COMPREPLY=( $(compgen -W "$commands" -- "$cur") )
    return
  fi

  case "\${words[1]}:$prev" in
    advisors:--type)
      COMPREPLY=( $(compgen -W "${ADVISOR_TYPES}" -- "$cur") )
      return
      ;;
    cost:--type)
      COMPREPLY=( $(compgen -W "${COST_TYPES}" -- "$cur") )
      return
      ;;
  esac
}
complete -F _supabase_mcp_complete supabase-mcp
`;
}

function zshCompletion(commands: string[]) {
  const commandList = normalizedCommandList(commands);
  return `#compdef supabase-mcp
_supabase_mcp() {
  local -a commands
  commands=(${commandList.map((command) => `"${command}"`).join(" ")})
  _arguments "1:command:(${commandList.join(" ")})" "*::arg:->args"

  case $state in
    args)
      case $words[1] in
        advisors)
          _arguments "--type[advisor type]:type:(${ADVISOR_TYPES})"
          ;;
        cost)
          _arguments "--type[cost type]:type:(${COST_TYPES})"
          ;;
      esac
      ;;
  esac
}
_supabase_mcp "$@"
`;
}

function fishCompletion(commands: string[]) {
  const commandList = normalizedCommandList(commands);
  return commandList
    .map((command) => `complete -c supabase-mcp -f -n "__fish_use_subcommand" -a "${command}"`)
    .concat([
      `complete -c supabase-mcp -n '__fish_seen_subcommand_from advisors' -l type -a '${ADVISOR_TYPES}'`,
      `complete -c supabase-mcp -n '__fish_seen_subcommand_from cost' -l type -a '${COST_TYPES}'`
    ])
    .join("\n");
}

export type CompletionShell = "bash" | "zsh" | "fish";

export function completionScript(shell: CompletionShell, commands: string[]) {
  if (shell === "bash") {
    return bashCompletion(commands);
  }
  if (shell === "zsh") {
    return zshCompletion(commands);
  }
  return fishCompletion(commands);
}
