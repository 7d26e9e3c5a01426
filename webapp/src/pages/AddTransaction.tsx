import React from "react";
import { format } from "date-fns";
import { z } from "zod";
import { zodResolver } from "@hookform/resolvers/zod";
import { Controller, useForm } from "react-hook-form";
import { ImagePlus, Sparkles } from "lucide-react";
import { toast } from "sonner";
import { useCategoriesQuery, useClassifyQuery, useCreateTransactionMutation } from "@/api/queries";
import { Button } from "@/components/ui/button";
import { FieldError, Input } from "@/components/ui/input";
import { Label } from "@/components/ui/label";
import { Select, SelectContent, SelectItem, SelectTrigger, SelectValue } from "@/components/ui/select";
import { useDebouncedValue } from "@/lib/useDebouncedValue";

const AUTO = "auto";
export const MAX_RECEIPT_BYTES = 5 * 1024 * 1024;
const RECEIPT_TYPES = ["image/png", "image/jpeg"];

export const transactionFormSchema = z.object({
  description: z.string().trim().min(1, "Description is required"),
  amount: z
    .string()
    .trim()
    .regex(/^-?\d+(\.\d{1,2})?$/, "Amount must be a number with at most 2 decimal places"),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Date is required"),
  type: z.enum(["expense", "income"]),
  category: z.string(),
});

type Values = z.infer<typeof transactionFormSchema>;

/** Returns an error message, or undefined when the file can be uploaded. */
export function checkReceipt(file: File): string | undefined {
  if (!RECEIPT_TYPES.includes(file.type)) return "Receipt must be a PNG or JPEG image";
  if (file.size > MAX_RECEIPT_BYTES) return "Receipt file size must be less than 5MB";
  return undefined;
}

function emptyValues(): Values {
  return { description: "", amount: "", date: format(new Date(), "yyyy-MM-dd"), type: "expense", category: AUTO };
}

export function AddTransactionPage() {
  const categoriesQuery = useCategoriesQuery();
  const createTx = useCreateTransactionMutation();
  const [receipt, setReceipt] = React.useState<File | null>(null);
  const [receiptError, setReceiptError] = React.useState<string>();
  const fileInputRef = React.useRef<HTMLInputElement | null>(null);

  const form = useForm<Values>({
    resolver: zodResolver(transactionFormSchema),
    defaultValues: emptyValues(),
  });

  const description = useDebouncedValue(form.watch("description"), 350);
  const suggestion = useClassifyQuery(description);
  const suggested = suggestion.data?.category;
  const errors = form.formState.errors;

  async function onSubmit(v: Values) {
    try {
      const created = await createTx.mutateAsync({
        input: {
          description: v.description,
          amount: v.amount,
          date: v.date,
          type: v.type,
          category: v.category === AUTO ? undefined : v.category,
        },
        receipt,
      });
      toast.success("Transaction added", {
        description: `${created.description} · ${created.category}${created.hasReceipt ? " · receipt saved" : ""}`,
      });
      form.reset(emptyValues());
      setReceipt(null);
      if (fileInputRef.current) fileInputRef.current.value = "";
    } catch (e) {
      toast.error(e instanceof Error ? e.message : "Failed to add transaction");
    }
  }

  return (
    <div className="space-y-6">
      <div>
        <div className="text-xs uppercase tracking-widest text-muted-foreground">Add transaction</div>
        <div className="mt-1 text-2xl font-semibold tracking-tight">New income or expense</div>
        <div className="mt-1 text-sm text-muted-foreground">
          Leave the category on Auto and it is picked from the description.
        </div>
      </div>

      <form
        className="max-w-2xl space-y-4 rounded-3xl border border-border/60 bg-card/50 p-5 shadow-soft-lg"
        onSubmit={form.handleSubmit(onSubmit)}
        noValidate
      >
        <div className="space-y-1.5">
          <Label htmlFor="tx-description">Description</Label>
          <Input
            id="tx-description"
            placeholder="e.g. Coffee at Starbucks"
            invalid={Boolean(errors.description)}
            {...form.register("description")}
          />
          <FieldError message={errors.description?.message} />
          {suggested ? (
            <div className="flex items-center gap-1.5 text-xs text-muted-foreground">
              <Sparkles className="h-3.5 w-3.5 text-primary" />
              Suggested category: <span className="font-semibold text-foreground">{suggested}</span>
            </div>
          ) : null}
        </div>

        <div className="grid grid-cols-1 gap-4 sm:grid-cols-2">
          <div className="space-y-1.5">
            <Label htmlFor="tx-amount">Amount</Label>
            <Input
              id="tx-amount"
              inputMode="decimal"
              placeholder="0.00"
              invalid={Boolean(errors.amount)}
              {...form.register("amount")}
            />
            <FieldError message={errors.amount?.message} />
          </div>
          <div className="space-y-1.5">
            <Label htmlFor="tx-date">Date</Label>
            <Input id="tx-date" type="date" invalid={Boolean(errors.date)} {...form.register("date")} />
            <FieldError message={errors.date?.message} />
          </div>
        </div>

        <div className="grid grid-cols-1 gap-4 sm:grid-cols-2">
          <div className="space-y-1.5">
            <Label>Type</Label>
            <Controller
              control={form.control}
              name="type"
              render={({ field }) => (
                <Select
                  value={field.value}
                  onValueChange={(v) => field.onChange(v === "income" ? "income" : "expense")}
                >
                  <SelectTrigger aria-label="Type">
                    <SelectValue />
                  </SelectTrigger>
                  <SelectContent>
                    <SelectItem value="expense">Expense</SelectItem>
                    <SelectItem value="income">Income</SelectItem>
                  </SelectContent>
                </Select>
              )}
            />
          </div>
          <div className="space-y-1.5">
            <Label>Category</Label>
            <Controller
              control={form.control}
              name="category"
              render={({ field }) => (
                <Select value={field.value} onValueChange={field.onChange}>
                  <SelectTrigger aria-label="Category">
                    <SelectValue />
                  </SelectTrigger>
                  <SelectContent>
                    <SelectItem value={AUTO}>{suggested ? `Auto (${suggested})` : "Auto"}</SelectItem>
                    {(categoriesQuery.data ?? []).map((c) => (
                      <SelectItem key={c} value={c}>
                        {c}
                      </SelectItem>
                    ))}
                  </SelectContent>
                </Select>
              )}
            />
          </div>
        </div>

        <div className="space-y-1.5">
          <Label htmlFor="tx-receipt">Receipt (optional)</Label>
          <Input
            id="tx-receipt"
            ref={fileInputRef}
            type="file"
            accept="image/png,image/jpeg"
            invalid={Boolean(receiptError)}
            onChange={(e) => {
              const f = e.currentTarget.files?.[0] ?? null;
              const problem = f ? checkReceipt(f) : undefined;
              setReceiptError(problem);
              setReceipt(problem ? null : f);
            }}
          />
          <FieldError message={receiptError} />
          <div className="flex items-center gap-1.5 text-xs text-muted-foreground">
            <ImagePlus className="h-3.5 w-3.5" />
            {receipt ? receipt.name : "PNG or JPEG, up to 5MB"}
          </div>
        </div>

        <div className="flex justify-end">
          <Button type="submit" loading={createTx.isPending}>
            Add transaction
          </Button>
        </div>
      </form>
    </div>
  );
}
