function escapeHtml(value: string): string {
  return value.replace(/[<>&"']/g, (ch) => {
    switch (ch) {
      case "<":
        return "&lt;";
      case ">":
        return "&gt;";
      case "&":
        return "&amp;";
      case '"':
        return "&quot;";
      case "'":
        return "&#39;";
      default:
        return ch;
    }
  });
}

function page(title: string, background: string, body: string): string {
  return [
    "<!DOCTYPE html>",
    "<html>",
    `<head><title>${title}</title></head>`,
    `<body style="font-family: sans-serif; display: flex; justify-content: center; align-items: center; height: 100vh; margin: 0; background: ${background}; color: white;">`,
    `<div style="text-align: center;">${body}</div>`,
    "</body>",
    "</html>"
  ].join("\n");
}

/** Shown in the OAuth popup once the Docs account is linked; closes itself. */
export function sparkConnectedPage(): string {
  return page(
    "Spark - Connected!",
    "linear-gradient(135deg, #667eea 0%, #764ba2 100%)",
    [
      "<h1>Spark Connected!</h1>",
      "<p>Your ideas will now sync to Google Docs.</p>",
      "<p><small>You can close this window.</small></p>",
      "<script>setTimeout(function () { window.close(); }, 3000);</script>"
    ].join("")
  );
}

export function sparkFailedPage(reason: string): string {
  return page(
    "Spark - Error",
    "#f44336",
    [
      "<h1>Connection Failed</h1>",
      `<p>${escapeHtml(reason)}</p>`,
      "<p><small>Please close this window and try again.</small></p>"
    ].join("")
  );
}
