import { EditorSession, PEER_HIGHLIGHT_MS } from "./editorSession.mjs";
import type { ConnectionStatus, EditorView } from "./editorSession.mjs";

function element<T extends HTMLElement>(id: string, type: new () => T): T {
  const found = document.getElementById(id);
  if (!(found instanceof type)) {
    throw new Error(`#${id} is missing from the page`);
  }
  return found;
}

const editor = element("editor", HTMLTextAreaElement);
const userInput = element("user-id", HTMLInputElement);
const statusLabel = element("status", HTMLElement);
const userCountLabel = element("user-count", HTMLElement);
const errorLabel = element("error", HTMLElement);
const reconnectButton = element("reconnect", HTMLButtonElement);

const USER_KEY = "textSyncUserId";
const storedUser = window.localStorage.getItem(USER_KEY);
const userId = storedUser || `user-${Math.random().toString(36).slice(2, 8)}`;
window.localStorage.setItem(USER_KEY, userId);
userInput.value = userId;

let highlightTimer: number | undefined;

const view: EditorView = {
  showText(text, fromPeer) {
    const cursor = editor.selectionStart;
    editor.value = text;
    editor.selectionStart = editor.selectionEnd = Math.min(cursor, text.length);
    if (fromPeer) {
      editor.classList.add("peer-edit");
      window.clearTimeout(highlightTimer);
      highlightTimer = window.setTimeout(() => editor.classList.remove("peer-edit"), PEER_HIGHLIGHT_MS);
    }
  },
  showUserCount(count) {
    userCountLabel.textContent = `Users: ${count}`;
  },
  showStatus(status: ConnectionStatus) {
    statusLabel.textContent = status;
    statusLabel.dataset.status = status;
  },
  showError(message) {
    errorLabel.textContent = message;
  }
};

const session = new EditorSession(userId, view);
let socket: WebSocket | null = null;

async function loadCurrentText() {
  const response = await fetch("/text");
  if (!response.ok) throw new Error(`GET /text answered ${response.status}`);
  const body: unknown = await response.json();
  if (body && typeof body === "object" && "content" in body && typeof body.content === "string") {
    session.load(body.content);
  }
}

function connect() {
  socket?.close();
  view.showStatus("connecting");
  const scheme = location.protocol === "https:" ? "wss" : "ws";
  const ws = new WebSocket(`${scheme}://${location.host}/ws?user_id=${encodeURIComponent(session.userId)}`);
  socket = ws;

  ws.addEventListener("open", () => {
    if (socket === ws) view.showStatus("connected");
  });
  ws.addEventListener("close", () => {
    if (socket === ws) view.showStatus("disconnected");
  });
  ws.addEventListener("message", (event) => {
    if (typeof event.data !== "string") return;
    try {
      session.handleServerMessage(event.data);
    } catch (error) {
      console.warn("Ignoring server message:", error);
    }
  });
}

editor.addEventListener("input", () => {
  const payload = session.localChange(editor.value);
  if (payload && socket?.readyState === WebSocket.OPEN) {
    socket.send(payload);
  }
});

userInput.addEventListener("change", () => {
  const next = userInput.value.trim();
  if (!next) return;
  session.userId = next;
  window.localStorage.setItem(USER_KEY, next);
});

reconnectButton.addEventListener("click", () => connect());

loadCurrentText()
  .catch((error: unknown) => {
    view.showError(error instanceof Error ? error.message : String(error));
  })
  .finally(() => connect());
