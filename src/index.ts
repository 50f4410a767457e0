#!/usr/bin/env node
import "dotenv/config"
import { TradeStatus } from "./enum/tradeStatus"
import { ConfigError, errorMessage } from "./errors"
import { formatRecord, formatSummary, exportSchedule } from "./reports/scheduleReport"
import { TradingEngine } from "./robot/tradingEngine"
import { CliArgs, parseArgs } from "./utils/cliArgs"

const PREVIEW_RECORDS = 10

// 📋 MODO SUMMARY: carrega e mostra a agenda, sem disparar nada
async function runSummary(engine: TradingEngine, args: CliArgs): Promise<void> {
  const summary = await engine.load()
  formatSummary(summary).forEach((line) => console.log(line))

  const schedule = engine.getSchedule()
  if (schedule.length > 0) {
    console.log(`\n📋 Próximos registros:`)
    for (const record of schedule.slice(0, PREVIEW_RECORDS)) {
      console.log(`   ${formatRecord(record)}`)
    }
    if (schedule.length > PREVIEW_RECORDS) {
      console.log(`   ... e mais ${schedule.length - PREVIEW_RECORDS} registros`)
    }
  }

  if (args.exportPath) {
    exportSchedule(schedule, args.exportPath)
  }
}

// 🚀 MODO TRADE: roda o dispatcher até acabar a agenda ou chegar Ctrl+C
async function runTrade(engine: TradingEngine): Promise<boolean> {
  const summary = await engine.start()
  formatSummary(summary).forEach((line) => console.log(line))

  const onSignal = (signal: NodeJS.Signals) => {
    console.log(`\n📡 Sinal ${signal} recebido, encerrando no próximo tick...`)
    engine.stop().catch((err) => console.error("❌ Erro ao parar:", errorMessage(err)))
  }
  process.once("SIGINT", onSignal)
  process.once("SIGTERM", onSignal)

  try {
    const result = await engine.waitForFinish()
    if (result) {
      console.log("\n📊 Resultado final:")
      formatSummary(result.summary).forEach((line) => console.log(line))
    }
    return result?.summary.byStatus[TradeStatus.FAILED] === 0
  } finally {
    process.off("SIGINT", onSignal)
    process.off("SIGTERM", onSignal)
  }
}

async function main(argv: readonly string[]): Promise<number> {
  let args: CliArgs
  try {
    args = parseArgs(argv)
  } catch (err) {
    console.error(`❌ ${errorMessage(err)}`)
    return 2
  }

  console.log(`\n🤖 FX Schedule Trader (${args.mode}${args.dryRun ? ", dry-run" : ""})`)
  const engine = new TradingEngine({ dryRun: args.dryRun })

  try {
    if (args.mode === "summary") {
      await runSummary(engine, args)
      return 0
    }
    const clean = await runTrade(engine)
    console.log(clean ? "✅ Agenda concluída" : "⚠️ Agenda concluída com falhas")
    return clean ? 0 : 1
  } catch (err) {
    const label = err instanceof ConfigError ? "Configuração inválida" : "Falha crítica"
    console.error(`❌ ${label}: ${errorMessage(err)}`)
    return 1
  }
}

export { main }

// Só executa main se rodar diretamente "npm start" ou "node dist/index.js"
if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => process.exit(code),
    (err) => {
      console.error("❌ Erro não capturado:", err)
      process.exit(1)
    },
  )
}
