import React from "react";
import { Download, FileUp, Upload } from "lucide-react";
import { toast } from "sonner";
import { api } from "@/api/client";
import { useImportCsvMutation, useTransactionsQuery } from "@/api/queries";
import { Button } from "@/components/ui/button";
import { FieldError, Input } from "@/components/ui/input";
import { Label } from "@/components/ui/label";
import { Select, SelectContent, SelectItem, SelectTrigger, SelectValue } from "@/components/ui/select";
import { previewCsv, summarizeRowErrors, type CsvPreview } from "@/lib/csvPreview";
import { defaultRange, isInvertedRange } from "@/lib/dateRanges";
import type { ExportFormat, ImportResult } from "@/types";

function openDownload(url: string) {
  window.open(url, "_blank", "noopener,noreferrer");
}

function ImportPanel() {
  const importCsv = useImportCsvMutation();
  const [file, setFile] = React.useState<File | null>(null);
  const [preview, setPreview] = React.useState<CsvPreview | null>(null);
  const [lastResult, setLastResult] = React.useState<ImportResult | null>(null);

  const onPickFile = React.useCallback(async (f: File | null) => {
    setFile(f);
    setLastResult(null);
    setPreview(f ? previewCsv(await f.text()) : null);
  }, []);

  const run = React.useCallback(
    async (commit: boolean) => {
      if (!file) {
        toast.message("Pick a CSV file first");
        return;
      }
      try {
        const res = await importCsv.mutateAsync({ file, commit });
        setLastResult(res);
        const title = commit ? "Import completed" : "Dry run completed";
        const count = commit ? res.importedRows : res.validRows;
        toast.success(title, {
          description: `${count} ${commit ? "imported" : "valid"} · ${res.skippedRows} skipped`,
        });
      } catch (e) {
        toast.error(e instanceof Error ? e.message : "Import failed");
      }
    },
    [file, importCsv],
  );

  const errorSummary = lastResult ? summarizeRowErrors(lastResult.errors) : null;
  const blocked = Boolean(preview?.missingColumns.length);

  return (
    <div className="rounded-3xl border border-border/60 bg-card/50 p-5 shadow-soft-lg">
      <div className="flex items-center justify-between gap-3">
        <div>
          <div className="text-sm font-semibold tracking-tight">Import transactions</div>
          <div className="mt-1 text-xs text-muted-foreground">
            CSV with columns description, amount, date, type and optionally category. Start with a dry run.
          </div>
        </div>
        <div className="flex items-center gap-2">
          <Button
            variant="secondary"
            disabled={!file || blocked || importCsv.isPending}
            onClick={() => run(false)}
          >
            Dry run
          </Button>
          <Button disabled={!file || blocked} loading={importCsv.isPending} onClick={() => run(true)}>
            <Upload className="h-4 w-4" />
            Import
          </Button>
        </div>
      </div>

      <div className="mt-4 space-y-1.5">
        <Label htmlFor="import-file">CSV file</Label>
        <Input
          id="import-file"
          type="file"
          accept=".csv,text/csv"
          onChange={(e) => {
            onPickFile(e.currentTarget.files?.[0] ?? null).catch((err: unknown) => {
              toast.error(err instanceof Error ? err.message : "Could not read the file");
            });
          }}
        />
        <div className="flex items-center gap-1.5 text-xs text-muted-foreground">
          <FileUp className="h-3.5 w-3.5" />
          {file ? file.name : "No file selected."}
        </div>
        {preview?.missingColumns.length ? (
          <FieldError message={`CSV must contain columns: description, amount, date, type (missing ${preview.missingColumns.join(", ")})`} />
        ) : null}
      </div>

      {preview && preview.rows.length ? (
        <div className="mt-4 overflow-x-auto rounded-2xl border border-border/60">
          <div className="px-3 pt-3 text-xs text-muted-foreground">Preview</div>
          <table className="w-full text-xs">
            <thead>
              <tr className="text-left text-muted-foreground">
                {preview.fields.map((f) => (
                  <th key={f} className="px-3 py-2 font-semibold">
                    {f}
                  </th>
                ))}
              </tr>
            </thead>
            <tbody>
              {preview.rows.map((r, i) => (
                <tr key={i} className="border-t border-border/50">
                  {preview.fields.map((f, j) => (
                    <td key={f} className="px-3 py-1.5">
                      {r[j] ?? ""}
                    </td>
                  ))}
                </tr>
              ))}
            </tbody>
          </table>
        </div>
      ) : null}

      {lastResult && errorSummary ? (
        <div className="mt-4 rounded-2xl border border-border/60 bg-background/30 px-3 py-3">
          <div className="text-xs text-muted-foreground">
            Last result {lastResult.commit ? "(committed)" : "(dry run)"}
          </div>
          <div className="mt-3 grid grid-cols-2 gap-3 text-xs md:grid-cols-4">
            <div>
              <div className="text-muted-foreground">Rows</div>
              <div className="font-semibold">{lastResult.totalRows}</div>
            </div>
            <div>
              <div className="text-muted-foreground">Valid</div>
              <div className="font-semibold">{lastResult.validRows}</div>
            </div>
            <div>
              <div className="text-muted-foreground">Imported</div>
              <div className="font-semibold">{lastResult.importedRows}</div>
            </div>
            <div>
              <div className="text-muted-foreground">Skipped</div>
              <div className="font-semibold">{lastResult.skippedRows}</div>
            </div>
          </div>

          {errorSummary.shown.length ? (
            <div className="mt-3 space-y-1 text-xs">
              <div className="font-semibold">Some rows had errors</div>
              {errorSummary.shown.map((line) => (
                <div key={line} className="text-muted-foreground">
                  - {line}
                </div>
              ))}
              {errorSummary.more ? <div className="text-muted-foreground">{errorSummary.more}</div> : null}
            </div>
          ) : null}
        </div>
      ) : null}
    </div>
  );
}

function ExportPanel() {
  const [range, setRange] = React.useState(() => defaultRange());
  const [formatValue, setFormatValue] = React.useState<ExportFormat>("csv");
  const inverted = isInvertedRange(range);
  const inRange = useTransactionsQuery(range);
  const count = inverted ? 0 : (inRange.data?.length ?? 0);

  return (
    <div className="rounded-3xl border border-border/60 bg-card/50 p-5 shadow-soft-lg">
      <div className="text-sm font-semibold tracking-tight">Export transactions</div>
      <div className="mt-1 text-xs text-muted-foreground">Download a date range as CSV or JSON.</div>

      <div className="mt-4 grid grid-cols-1 gap-3 md:grid-cols-3">
        <div className="space-y-1.5">
          <Label htmlFor="export-from">Start date</Label>
          <Input
            id="export-from"
            type="date"
            value={range.from}
            invalid={inverted}
            onChange={(e) => setRange((r) => ({ ...r, from: e.target.value }))}
          />
        </div>
        <div className="space-y-1.5">
          <Label htmlFor="export-to">End date</Label>
          <Input
            id="export-to"
            type="date"
            value={range.to}
            invalid={inverted}
            onChange={(e) => setRange((r) => ({ ...r, to: e.target.value }))}
          />
        </div>
        <div className="space-y-1.5">
          <Label>Format</Label>
          <Select value={formatValue} onValueChange={(v) => setFormatValue(v === "json" ? "json" : "csv")}>
            <SelectTrigger aria-label="Export format">
              <SelectValue />
            </SelectTrigger>
            <SelectContent>
              <SelectItem value="csv">CSV</SelectItem>
              <SelectItem value="json">JSON</SelectItem>
            </SelectContent>
          </Select>
        </div>
      </div>
      <FieldError message={inverted ? "Start date cannot be after end date" : undefined} />

      <div className="mt-4 flex items-center justify-between gap-3">
        <div className="text-xs text-muted-foreground">
          {inRange.isPending
            ? "Counting transactions…"
            : count
              ? `${count} transactions in range`
              : "No transactions found in the selected date range"}
        </div>
        <Button
          variant="secondary"
          disabled={inverted || count === 0}
          onClick={() => {
            openDownload(api.exportUrl(formatValue, range));
            toast.success(`Prepared ${count} transactions for ${formatValue.toUpperCase()} export`);
          }}
        >
          <Download className="h-4 w-4" />
          Export {formatValue.toUpperCase()}
        </Button>
      </div>
    </div>
  );
}

export function BulkActionsPage() {
  return (
    <div className="space-y-6">
      <div>
        <div className="text-xs uppercase tracking-widest text-muted-foreground">Bulk actions</div>
        <div className="mt-1 text-2xl font-semibold tracking-tight">Import & export</div>
      </div>
      <div className="grid grid-cols-1 gap-4 xl:grid-cols-2">
        <ImportPanel />
        <ExportPanel />
      </div>
    </div>
  );
}
