import { app } from "./index.js";

const PORT = process.env.PORT ? Number(process.env.PORT) : 3000;
app.listen(PORT, () => {
  console.log(`gradlefix API running on http://localhost:${PORT}`);
});
