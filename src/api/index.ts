import "dotenv/config";
import express from "express";
import cors from "cors";

import { getCorsOptions } from "./cors";
import attendanceRouter from "./routes/attendance";

const app = express();
const PORT = process.env.API_PORT || 3001;

// Middleware
app.use(cors(getCorsOptions()));
app.use(express.json());

// Routes
app.use("/api/attendance", attendanceRouter);

// Health check
app.get("/api/health", (req, res) => {
  res.json({ status: "ok", timestamp: new Date().toISOString() });
});

// Start server
app.listen(PORT, () => {
  console.log(`Attendance API running on http://localhost:${PORT}`);
});

export default app;
