export interface PageInfo {
  /** Repository shown in the header; null before the first ingest. */
  repoName: string | null
  lastRun: string | null
}

export function generatePage({ repoName, lastRun }: PageInfo): string {
  const title = repoName ?? "gitpulse"

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${escapeHtml(title)} - gitpulse dashboard</title>
<style>
:root {
  --bg: #0d1117;
  --bg-secondary: #161b22;
  --bg-tertiary: #21262d;
  --border: #30363d;
  --text: #e6edf3;
  --text-muted: #8b949e;
  --accent: #58a6ff;
  --red: #da3633;
  --green: #2ea043;
  --yellow: #d4a72c;
  --purple: #bc8cff;
}

* { margin: 0; padding: 0; box-sizing: border-box; }
body {
  background: var(--bg);
  color: var(--text);
  font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Helvetica, Arial, sans-serif;
  font-size: 14px;
  line-height: 1.5;
}

.layout {
  display: grid;
  grid-template-rows: auto 1fr;
  grid-template-columns: 260px 1fr;
  min-height: 100vh;
  max-width: 1600px;
  margin: 0 auto;
}

.header {
  grid-column: 1 / -1;
  padding: 12px 20px;
  border-bottom: 1px solid var(--border);
  display: flex;
  align-items: center;
  gap: 12px;
}

.header h1 { font-size: 16px; font-weight: 600; }
.header .meta { color: var(--text-muted); font-size: 12px; margin-left: auto; }

.sidebar {
  border-right: 1px solid var(--border);
  padding: 16px 20px;
  display: flex;
  flex-direction: column;
  gap: 14px;
}

.sidebar label {
  display: flex;
  flex-direction: column;
  gap: 4px;
  font-size: 12px;
  color: var(--text-muted);
  text-transform: uppercase;
  letter-spacing: 0.5px;
}

.sidebar label.inline { flex-direction: row; align-items: center; gap: 8px; }

.sidebar input, .sidebar select {
  background: var(--bg-secondary);
  color: var(--text);
  border: 1px solid var(--border);
  border-radius: 6px;
  padding: 6px 8px;
  font-size: 13px;
}

.sidebar select[multiple] { min-height: 120px; }

.sidebar button {
  background: var(--accent);
  color: var(--bg);
  border: none;
  border-radius: 6px;
  padding: 8px;
  font-weight: 600;
  cursor: pointer;
}

.main { padding: 16px 20px; overflow-x: hidden; }

.error {
  display: none;
  background: var(--bg-tertiary);
  color: var(--red);
  padding: 8px 12px;
  border-radius: 6px;
  margin-bottom: 12px;
}

.error.visible { display: block; }

.kpis {
  display: grid;
  grid-template-columns: repeat(4, 1fr);
  gap: 8px;
  margin-bottom: 16px;
}

.stat-item { background: var(--bg-secondary); border-radius: 6px; padding: 8px 12px; }
.stat-value { font-size: 22px; font-weight: 600; }
.stat-label { font-size: 11px; color: var(--text-muted); }

.charts {
  display: grid;
  grid-template-columns: 1fr 1fr;
  gap: 16px;
  margin-bottom: 16px;
}

.chart { background: var(--bg-secondary); border-radius: 6px; padding: 12px; min-height: 260px; }
.chart h3 {
  font-size: 12px;
  font-weight: 600;
  color: var(--text-muted);
  text-transform: uppercase;
  letter-spacing: 0.5px;
  margin-bottom: 8px;
}
.chart svg { width: 100%; display: block; }
.chart .empty { color: var(--text-muted); font-style: italic; padding: 20px 0; }
.chart text { fill: var(--text-muted); font-size: 11px; }
.chart .domain, .chart .tick line { stroke: var(--border); }

table { width: 100%; border-collapse: collapse; font-size: 13px; }
th {
  text-align: left;
  color: var(--text-muted);
  font-weight: 600;
  border-bottom: 1px solid var(--border);
  padding: 6px 8px;
}
td { border-bottom: 1px solid var(--bg-tertiary); padding: 6px 8px; vertical-align: top; }
td.hash { font-family: ui-monospace, SFMono-Regular, Menlo, monospace; color: var(--accent); }
td.num { text-align: right; white-space: nowrap; }
.add { color: var(--green); }
.del { color: var(--red); }
.tag {
  display: inline-block;
  background: var(--bg-tertiary);
  color: var(--yellow);
  border-radius: 4px;
  padding: 0 6px;
  margin-right: 4px;
  font-size: 11px;
}

@media (max-width: 900px) {
  .layout { grid-template-columns: 1fr; }
  .sidebar { border-right: none; border-bottom: 1px solid var(--border); }
  .charts, .kpis { grid-template-columns: 1fr 1fr; }
}
</style>
</head>
<body>
<div class="layout">
  <div class="header">
    <h1>${escapeHtml(title)}</h1>
    <div class="meta">Last ingest: ${escapeHtml(lastRun ?? "never")}</div>
  </div>
  <form class="sidebar" id="filters">
    <label>Start <input type="date" name="start" id="start"></label>
    <label>End <input type="date" name="end" id="end"></label>
    <label>Authors <select name="author" id="authors" multiple></select></label>
    <label>Files <input type="text" name="files" id="files" list="popular-files" placeholder="e.g. src/api"></label>
    <datalist id="popular-files"></datalist>
    <label class="inline"><input type="checkbox" name="fixes" id="fixes" value="1"> Fixes only</label>
    <label>Granularity
      <select name="granularity" id="granularity">
        <option value="day">Day</option>
        <option value="week">Week</option>
        <option value="month">Month</option>
      </select>
    </label>
    <button type="submit">Apply</button>
  </form>
  <div class="main">
    <div class="error" id="error"></div>
    <div class="kpis">
      <div class="stat-item"><div class="stat-value" id="kpi-commits">-</div><div class="stat-label">Commits</div></div>
      <div class="stat-item"><div class="stat-value add" id="kpi-additions">-</div><div class="stat-label">Lines added</div></div>
      <div class="stat-item"><div class="stat-value del" id="kpi-deletions">-</div><div class="stat-label">Lines deleted</div></div>
      <div class="stat-item"><div class="stat-value" id="kpi-fixes">-</div><div class="stat-label">Fix commits</div></div>
    </div>
    <div class="charts">
      <div class="chart"><h3>Commit volume</h3><div id="chart-volume"></div></div>
      <div class="chart"><h3>Top authors</h3><div id="chart-authors"></div></div>
      <div class="chart"><h3>Top files</h3><div id="chart-files"></div></div>
      <div class="chart"><h3>File change trend</h3><div id="chart-churn"></div></div>
    </div>
    <table>
      <thead>
        <tr><th>Commit</th><th>Date</th><th>Author</th><th>Message</th><th>+/-</th><th>Files</th></tr>
      </thead>
      <tbody id="commits"></tbody>
    </table>
  </div>
</div>

<script src="https://d3js.org/d3.v7.min.js"></script>
<script>
(function () {
  var form = document.getElementById("filters");
  var errorBox = document.getElementById("error");
  var fmt = d3.format(",");
  var current = null;

  function showError(message) {
    errorBox.textContent = message;
    errorBox.classList.toggle("visible", Boolean(message));
  }

  function getJson(url) {
    return fetch(url).then(function (res) {
      return res.json().then(function (body) {
        if (!res.ok) throw new Error(body.error || "request failed");
        return body;
      });
    });
  }

  function queryString() {
    var params = new URLSearchParams();
    var start = form.start.value;
    var end = form.end.value;
    if (start) params.set("start", start);
    if (end) params.set("end", end);
    Array.prototype.forEach.call(form.author.selectedOptions, function (o) {
      params.append("author", o.value);
    });
    if (form.files.value.trim()) params.set("files", form.files.value.trim());
    if (form.fixes.checked) params.set("fixes", "1");
    params.set("granularity", form.granularity.value);
    return params.toString();
  }

  function empty(el, message) {
    d3.select(el).selectAll("*").remove();
    d3.select(el).append("div").attr("class", "empty").text(message);
  }

  function columnChart(el, rows, label, value, color) {
    if (!rows.length) return empty(el, "No commits in this range");
    d3.select(el).selectAll("*").remove();
    var width = el.clientWidth || 500, height = 220;
    var m = { top: 8, right: 8, bottom: 40, left: 40 };
    var x = d3.scaleBand().domain(rows.map(label)).range([m.left, width - m.right]).padding(0.15);
    var y = d3.scaleLinear().domain([0, d3.max(rows, value) || 1]).nice().range([height - m.bottom, m.top]);
    var svg = d3.select(el).append("svg").attr("viewBox", [0, 0, width, height]);
    var step = Math.ceil(rows.length / 12);
    svg.append("g").attr("transform", "translate(0," + (height - m.bottom) + ")")
      .call(d3.axisBottom(x).tickValues(x.domain().filter(function (_, i) { return i % step === 0; })))
      .selectAll("text").attr("transform", "rotate(-30)").style("text-anchor", "end");
    svg.append("g").attr("transform", "translate(" + m.left + ",0)").call(d3.axisLeft(y).ticks(5));
    svg.append("g").selectAll("rect").data(rows).join("rect")
      .attr("x", function (d) { return x(label(d)); })
      .attr("y", function (d) { return y(value(d)); })
      .attr("width", x.bandwidth())
      .attr("height", function (d) { return y(0) - y(value(d)); })
      .attr("fill", color)
      .append("title").text(function (d) { return label(d) + ": " + fmt(value(d)); });
  }

  function barChart(el, rows, label, value, color, onClick) {
    if (!rows.length) return empty(el, "No commits in this range");
    d3.select(el).selectAll("*").remove();
    var width = el.clientWidth || 500, rowHeight = 22;
    var height = rows.length * rowHeight + 8;
    var left = Math.min(220, width * 0.45);
    var x = d3.scaleLinear().domain([0, d3.max(rows, value) || 1]).range([0, width - left - 48]);
    var svg = d3.select(el).append("svg").attr("viewBox", [0, 0, width, height]);
    var g = svg.selectAll("g").data(rows).join("g")
      .attr("transform", function (_, i) { return "translate(0," + (i * rowHeight + 4) + ")"; })
      .style("cursor", onClick ? "pointer" : null)
      .on("click", function (_, d) { if (onClick) onClick(d); });
    g.append("text").attr("x", left - 6).attr("y", 14).attr("text-anchor", "end")
      .text(function (d) { var s = label(d); return s.length > 34 ? "..." + s.slice(-31) : s; })
      .append("title").text(label);
    g.append("rect").attr("x", left).attr("y", 3).attr("height", rowHeight - 8)
      .attr("width", function (d) { return Math.max(1, x(value(d))); }).attr("fill", color);
    g.append("text").attr("x", function (d) { return left + x(value(d)) + 6; }).attr("y", 14)
      .text(function (d) { return fmt(value(d)); });
  }

  function churnChart(el, rows) {
    if (!form.files.value.trim()) return empty(el, "Enter a file pattern to see its change trend");
    if (!rows.length) return empty(el, "No matching file changes in this range");
    d3.select(el).selectAll("*").remove();
    var width = el.clientWidth || 500, height = 220;
    var m = { top: 8, right: 8, bottom: 40, left: 48 };
    var x = d3.scalePoint().domain(rows.map(function (d) { return d.period; })).range([m.left, width - m.right]).padding(0.5);
    var y = d3.scaleLinear().domain([0, d3.max(rows, function (d) { return Math.max(d.additions, d.deletions); }) || 1])
      .nice().range([height - m.bottom, m.top]);
    var svg = d3.select(el).append("svg").attr("viewBox", [0, 0, width, height]);
    var step = Math.ceil(rows.length / 12);
    svg.append("g").attr("transform", "translate(0," + (height - m.bottom) + ")")
      .call(d3.axisBottom(x).tickValues(x.domain().filter(function (_, i) { return i % step === 0; })))
      .selectAll("text").attr("transform", "rotate(-30)").style("text-anchor", "end");
    svg.append("g").attr("transform", "translate(" + m.left + ",0)").call(d3.axisLeft(y).ticks(5));
    [["additions", "var(--green)"], ["deletions", "var(--red)"]].forEach(function (series) {
      var line = d3.line()
        .x(function (d) { return x(d.period); })
        .y(function (d) { return y(d[series[0]]); });
      svg.append("path").datum(rows).attr("fill", "none").attr("stroke", series[1]).attr("stroke-width", 2).attr("d", line);
    });
  }

  function renderTable(commits) {
    var rows = d3.select("#commits").selectAll("tr").data(commits, function (d) { return d.hash; }).join("tr");
    rows.html("");
    rows.append("td").attr("class", "hash").text(function (d) { return d.hash.slice(0, 7); });
    rows.append("td").text(function (d) { return d.authored_at.slice(0, 10); });
    rows.append("td").text(function (d) { return d.author_name; }).attr("title", function (d) { return d.author_email; });
    var msg = rows.append("td");
    msg.selectAll("span.tag").data(function (d) { return d.error_tags; }).join("span").attr("class", "tag").text(function (t) { return t; });
    msg.append("span").text(function (d) { return d.message.split("\\n")[0]; });
    var num = rows.append("td").attr("class", "num");
    num.append("span").attr("class", "add").text(function (d) { return "+" + fmt(d.additions) + " "; });
    num.append("span").attr("class", "del").text(function (d) { return "-" + fmt(d.deletions); });
    rows.append("td").attr("class", "num").text(function (d) { return fmt(d.files_changed); });
  }

  function render(data) {
    current = data;
    document.getElementById("kpi-commits").textContent = fmt(data.kpis.commits);
    document.getElementById("kpi-additions").textContent = "+" + fmt(data.kpis.additions);
    document.getElementById("kpi-deletions").textContent = "-" + fmt(data.kpis.deletions);
    var pct = data.kpis.commits ? Math.round((data.kpis.fixCommits / data.kpis.commits) * 100) : 0;
    document.getElementById("kpi-fixes").textContent = fmt(data.kpis.fixCommits) + " (" + pct + "%)";
    columnChart(document.getElementById("chart-volume"), data.volume,
      function (d) { return d.period; }, function (d) { return d.commits; }, "var(--accent)");
    barChart(document.getElementById("chart-authors"), data.topAuthors,
      function (d) { return d.author_name; }, function (d) { return d.commits; }, "var(--purple)");
    barChart(document.getElementById("chart-files"), data.topFiles,
      function (d) { return d.file_path; }, function (d) { return d.commits; }, "var(--yellow)",
      function (d) { form.files.value = d.file_path; refresh(); });
    churnChart(document.getElementById("chart-churn"), data.churn);
    renderTable(data.commits);
  }

  function refresh() {
    return getJson("/api/dashboard?" + queryString())
      .then(function (data) { showError(""); render(data); })
      .catch(function (err) { showError(err.message); });
  }

  function loadOptions() {
    return getJson("/api/options").then(function (options) {
      if (options.firstDate) form.start.value = options.firstDate;
      if (options.lastDate) form.end.value = options.lastDate;
      d3.select("#authors").selectAll("option").data(options.authors).join("option")
        .attr("value", function (a) { return a.author_email; })
        .text(function (a) { return a.author_name + " (" + fmt(a.commits) + ")"; });
      d3.select("#popular-files").selectAll("option").data(options.popularFiles).join("option")
        .attr("value", function (f) { return f; });
    });
  }

  form.addEventListener("submit", function (event) {
    event.preventDefault();
    refresh();
  });
  form.granularity.addEventListener("change", refresh);
  form.fixes.addEventListener("change", refresh);
  window.addEventListener("resize", function () { if (current) render(current); });

  loadOptions().then(refresh).catch(function (err) { showError(err.message); });
})();
</script>
</body>
</html>`
}

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
}
