/**
 * Stylesheets and the built-in HTML layout used on the PDF path.
 */

/**
 * Full stylesheet for the Chromium engine. Page header and footer text come
 * from the engine's header/footer templates.
 */
export const PRIMARY_STYLESHEET = `
@page {
  size: A4;
  margin: 25mm;
}

body {
  font-family: Arial, Helvetica, sans-serif;
  font-size: 12pt;
  line-height: 1.6;
  color: #333;
}

header {
  text-align: center;
  margin-bottom: 30px;
}

header .company-info {
  padding-bottom: 20px;
  border-bottom: 2px solid #0066cc;
}

header h1 {
  color: #0066cc;
  font-size: 24pt;
  margin: 0;
}

header .location {
  color: #666;
  font-size: 11pt;
  margin-top: 5px;
}

.document-header {
  text-align: center;
  margin-bottom: 30px;
}

.document-header h2 {
  color: #333;
  font-size: 20pt;
  margin: 0;
}

.metadata {
  color: #666;
  font-size: 10pt;
  margin-top: 10px;
}

main h1 { color: #0066cc; font-size: 18pt; margin: 20px 0 10px; }
main h2 { color: #0066cc; font-size: 16pt; margin: 15px 0 8px; }
main h3 { color: #333; font-size: 14pt; margin: 12px 0 6px; }

p { margin: 0 0 10px; text-align: justify; }
ul, ol { margin: 0 0 15px; }
li { margin-bottom: 5px; }
strong { color: #000; }

table { width: 100%; border-collapse: collapse; margin-bottom: 15px; page-break-inside: avoid; }
th, td { border: 1px solid #ddd; padding: 8px; text-align: left; }
th { background-color: #f2f2f2; font-weight: bold; }

pre { background: #f6f8fa; padding: 10px; border-radius: 4px; font-size: 9pt; white-space: pre-wrap; }
code { font-family: 'Courier New', monospace; }
.token.comment { color: #6a737d; }
.token.keyword { color: #d73a49; }
.token.string { color: #032f62; }
.token.number { color: #005cc5; }
.token.function { color: #6f42c1; }

footer {
  text-align: center;
  margin-top: 40px;
  padding-top: 20px;
  border-top: 1px solid #ddd;
  font-size: 9pt;
  color: #666;
}
`;

/**
 * Reduced CSS 2.1 subset for the fallback engine. Page margins are the
 * engine's own, so body carries none.
 */
export const FALLBACK_STYLESHEET = `
body { font-family: Helvetica, sans-serif; font-size: 11pt; color: #333333; }
header { text-align: center; margin-bottom: 18pt; }
header h1 { color: #0066cc; font-size: 22pt; margin: 0; }
header .location { color: #666666; font-size: 10pt; margin-top: 4pt; }
.document-header { text-align: center; margin-bottom: 18pt; }
.document-header h2 { color: #333333; font-size: 18pt; margin: 0; }
.metadata { color: #666666; font-size: 9pt; margin-top: 6pt; }
main h1 { color: #0066cc; font-size: 16pt; margin-top: 14pt; margin-bottom: 6pt; }
main h2 { color: #0066cc; font-size: 14pt; margin-top: 12pt; margin-bottom: 5pt; }
main h3 { color: #333333; font-size: 12pt; margin-top: 10pt; margin-bottom: 4pt; }
p { margin-bottom: 8pt; }
li { margin-bottom: 3pt; }
strong { color: #000000; font-weight: bold; }
pre { font-size: 8pt; }
footer { text-align: center; margin-top: 24pt; font-size: 8pt; color: #666666; }
`;

/**
 * Layout used when no per-type template exists. `content` is trusted HTML
 * produced from the markdown; every other value is escaped.
 */
export const DEFAULT_HTML_TEMPLATE = `<!DOCTYPE html>
<html>
<head>
<meta charset="UTF-8">
<title>{{title}}</title>
{{#if reference}}<meta name="document-reference" content="{{reference}}">{{/if}}
</head>
<body>
<header>
{{#if company}}
<div class="company-info">
<h1>{{company.name}}</h1>
{{#if company.location}}<p class="location">{{company.location}}</p>{{/if}}
</div>
{{/if}}
</header>
<div class="document-header">
<h2>{{title}}</h2>
<p class="metadata">Generated: {{date}}{{#if reference}}<br>Reference: {{reference}}{{/if}}</p>
</div>
<main>
{{{content}}}
</main>
<footer>
{{#if company}}
<p>&copy; {{year}} {{company.name}}. All rights reserved.{{#if company.website}}<br>Website: {{company.website}}{{/if}}</p>
{{/if}}
</footer>
</body>
</html>
`;
