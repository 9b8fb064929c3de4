import httpStatus from "http-status";
import express from "express";
import institutionalRoutes from "./institutional.routes.js";

const router = express.Router();

router.get("/health", (_req, res) => {
  res.status(httpStatus.OK).json({ status: "OK" });
});

// Institutional Routes (13F quarter-over-quarter analysis)
router.use("/institutional", institutionalRoutes);

export default router;
