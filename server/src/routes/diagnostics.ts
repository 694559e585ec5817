import { Router } from "express";
import { z } from "zod";
import { validate } from "../middleware/validate";
import { type DiagnoseOptions, diagnose } from "../services/diagnostics";

const diagnoseSchema = z.object({
  email: z.string().trim().min(3).max(320),
  verbose: z.boolean().optional()
});

type DiagnoseRequest = z.infer<typeof diagnoseSchema>;

export function createDiagnosticsRouter(options: Omit<DiagnoseOptions, "verbose" | "signal">) {
  const router = Router();

  router.post("/diagnose", validate(diagnoseSchema), async (req, res) => {
    const { email, verbose }: DiagnoseRequest = req.body;
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort();
    });

    const result = await diagnose(email, { ...options, verbose, signal: controller.signal });
    res.json(result);
  });

  return router;
}
