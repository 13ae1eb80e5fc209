import { type LogEntry, formatTimestamp } from "./CommLog";

export class UIManager {
  private inputCommand: HTMLInputElement | null;
  private btnExecute: HTMLElement | null;
  private commMessages: HTMLElement | null;

  constructor(
    private callbacks: {
      onCommand: (cmd: string) => void;
    },
  ) {
    // UI References
    const input = document.getElementById("input-command");
    this.inputCommand = input instanceof HTMLInputElement ? input : null;
    this.btnExecute = document.getElementById("btn-execute");
    this.commMessages = document.getElementById("comm-messages");

    if (!this.inputCommand || !this.commMessages) {
      console.warn("UIManager: command panel elements missing");
    }

    this.setupEventListeners();
  }

  private setupEventListeners() {
    if (!this.inputCommand) return;

    this.inputCommand.addEventListener("keydown", (e) => {
      if (e.key === "Enter") {
        this.submit();
      }
    });

    this.btnExecute?.addEventListener("click", () => this.submit());
  }

  private submit() {
    if (!this.inputCommand) return;
    const cmd = this.inputCommand.value.trim();
    this.inputCommand.value = "";
    if (cmd) {
      this.callbacks.onCommand(cmd);
    }
  }

  public addLog(entry: LogEntry) {
    if (!this.commMessages) return;

    const div = document.createElement("div");
    div.classList.add("msg", entry.source.toLowerCase());

    // text nodes only: the COMMAND line is the operator's input
    const time = document.createElement("span");
    time.classList.add("timestamp");
    time.textContent = `[${formatTimestamp(entry.timestamp)}] `;

    const source = document.createElement("span");
    source.classList.add("source");
    source.textContent = `${entry.source}: `;

    div.append(time, source, document.createTextNode(entry.message));

    this.commMessages.appendChild(div);
    this.commMessages.scrollTop = this.commMessages.scrollHeight;
  }

  public focusCommandInput() {
    if (this.inputCommand && document.activeElement !== this.inputCommand) {
      this.inputCommand.focus();
    }
  }
}
